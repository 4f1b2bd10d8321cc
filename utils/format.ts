// Unknown speeds stay visibly unknown rather than showing as 0
export function formatSpeed(kmh: number | null): string {
  return kmh === null ? 'unknown' : `${kmh.toFixed(1)} km/h`;
}

/**
 * Format seconds as m:ss
 */
export function formatDuration(totalSeconds: number): string {
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = Math.floor(totalSeconds % 60);
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

/**
 * Get color for track ID
 */
export function getTrackColor(trackId: number): string {
  const colors = ['#00f3ff', '#00ff9d', '#ff0055', '#ffcc00', '#bd00ff', '#ffffff'];
  return colors[trackId % colors.length];
}
