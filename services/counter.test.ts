import { describe, it, expect, beforeEach, vi } from 'vitest';
import { VehicleCounter } from './counter';

const crossing = (trackId: number, timestamp: number) => ({ trackId, frameIndex: Math.round(timestamp * 30), timestamp });

describe('VehicleCounter', () => {
  let now = 100;
  const clock = () => now;

  beforeEach(() => {
    now = 100;
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  it('counts each track once', () => {
    const counter = new VehicleCounter({ clock });

    expect(counter.onCrossing(crossing(1, 1))).toBe(true);
    expect(counter.onCrossing(crossing(1, 2))).toBe(false);
    expect(counter.onCrossing(crossing(2, 3))).toBe(true);

    expect(counter.getCount()).toBe(2);
  });

  it('ignores a repeated crossing event for the same track', () => {
    const counter = new VehicleCounter({ clock });
    const event = crossing(7, 2);
    counter.onCrossing(event);
    counter.onCrossing(event);

    expect(counter.getCount()).toBe(1);
  });

  it('reports a rate over wall time since start', () => {
    const counter = new VehicleCounter({ clock });
    counter.onCrossing(crossing(1, 1));
    counter.onCrossing(crossing(2, 2));
    now = 104;

    expect(counter.getState()).toEqual({ uniqueCount: 2, ratePerSecond: 0.5 });
  });

  it('reports a zero rate before any time has passed', () => {
    const counter = new VehicleCounter({ clock });
    counter.onCrossing(crossing(1, 1));

    expect(counter.getState()).toEqual({ uniqueCount: 1, ratePerSecond: 0 });
  });

  it('computes vehicles per minute over a trailing window of stream time', () => {
    const counter = new VehicleCounter({ clock });
    [5, 20, 40, 70].forEach((t, i) => counter.onCrossing(crossing(i + 1, t)));

    // window (10, 70]: crossings at 20, 40, 70
    expect(counter.getRatePerMinute(60)).toBe(3);
    // window (40, 70]: only 70
    expect(counter.getRatePerMinute(30)).toBe(2);
    // window (-20, 40]: 5, 20, 40
    expect(counter.getRatePerMinute(60, 40)).toBe(3);
  });

  it('has no rate without crossings', () => {
    expect(new VehicleCounter({ clock }).getRatePerMinute()).toBe(0);
  });

  it('keeps a counted id for the life of the counter', () => {
    const counter = new VehicleCounter({ clock });
    counter.onCrossing(crossing(7, 1));
    for (let id = 8; id < 50; id++) counter.onCrossing(crossing(id, id));
    now = 10_000;

    expect(counter.onCrossing(crossing(7, 900))).toBe(false);
    expect(counter.getCount()).toBe(43);
    expect(counter.getRatePerMinute(60, 900)).toBe(0);
  });
});
