import { escapeHtml } from './html.js';

export type NavItem = 'scheduler' | 'analytics';

export interface LayoutOptions {
  title: string;
  active?: NavItem;
  body: string;
}

const NAV: Array<{ key: NavItem; href: string; label: string }> = [
  { key: 'scheduler', href: '/scheduler', label: 'Scheduler' },
  { key: 'analytics', href: '/analytics', label: 'Analytics' }
];

export function layout({ title, active, body }: LayoutOptions): string {
  const links = NAV.map(
    (item) =>
      `<a href="${item.href}"${item.key === active ? ' class="active" aria-current="page"' : ''}>${item.label}</a>`
  ).join('');

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)} · Post Scheduler</title>
<link rel="stylesheet" href="/static/styles.css">
</head>
<body>
<header class="topbar"><span class="brand">Post Scheduler</span><nav>${links}</nav></header>
<main>
${body}
</main>
</body>
</html>`;
}
