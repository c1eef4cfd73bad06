import type { AnalyticsSummary, PlatformAnalytics } from '../analytics.js';
import { escapeHtml, formatNumber } from './html.js';
import { layout } from './layout.js';

function renderRow(row: PlatformAnalytics) {
  const top = row.topPosts
    .map((p) => `<li>${escapeHtml(p.title)} <span class="muted">${formatNumber(p.engagement)} · ${escapeHtml(p.date)}</span></li>`)
    .join('');
  return `<tr data-platform="${row.key}">
<th scope="row"><span class="swatch" style="background:${row.color}"></span>${escapeHtml(row.name)}</th>
<td class="num">${formatNumber(row.followers)}</td>
<td class="num">${formatNumber(row.views7d)}</td>
<td class="num">${formatNumber(row.postsScheduled)}</td>
<td><ol class="top-posts">${top}</ol></td>
</tr>`;
}

export function analyticsPage({ rows, summary }: { rows: PlatformAnalytics[]; summary: AnalyticsSummary }): string {
  return layout({
    title: 'Analytics',
    active: 'analytics',
    body: `<section class="card">
<h2>Analytics</h2>
<p class="muted">Follower and view figures are sample data.</p>
<table class="metrics">
<thead><tr><th>Platform</th><th>Followers</th><th>Views (7d)</th><th>Scheduled</th><th>Top posts</th></tr></thead>
<tbody>
${rows.map(renderRow).join('\n')}
</tbody>
<tfoot><tr><th scope="row">Total</th><td class="num">${formatNumber(summary.followers)}</td><td class="num">${formatNumber(summary.views7d)}</td><td class="num">${formatNumber(summary.postsScheduled)}</td><td></td></tr></tfoot>
</table>
</section>`
  });
}
