import { renderToStaticMarkup } from 'react-dom/server';
import App from '../App';
import type { SessionSnapshot } from '../types';

export interface ReportMeta {
  sessionId: string;
  generatedAt: Date;
}

// Theme colors the report's utility classes refer to
const TAILWIND_THEME = `tailwind.config = {
  theme: {
    extend: {
      colors: {
        'dark-bg': '#0a0a0f',
        'panel-bg': '#12121a',
        'neon-blue': '#00f3ff',
        'neon-green': '#00ff9d',
        'neon-red': '#ff0055',
      },
    },
  },
};`;

export function renderReportHtml(snapshot: SessionSnapshot, meta: ReportMeta): string {
  const body = renderToStaticMarkup(
    <App snapshot={snapshot} sessionId={meta.sessionId} generatedAt={meta.generatedAt} />
  );
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8" />
<meta name="viewport" content="width=device-width, initial-scale=1.0" />
<title>Traffic Tracker - ${meta.sessionId}</title>
<script src="https://cdn.tailwindcss.com"></script>
<script>${TAILWIND_THEME}</script>
</head>
<body>
${body}
</body>
</html>
`;
}
