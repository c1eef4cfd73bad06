import { escapeHtml } from './html.js';
import { layout } from './layout.js';

export function errorPage({ status, message }: { status: number; message: string }): string {
  return layout({
    title: `Error ${status}`,
    body: `<section class="error">
<h1>${escapeHtml(status)}</h1>
<p>${escapeHtml(message)}</p>
<a href="/scheduler">Back to scheduler</a>
</section>`
  });
}
