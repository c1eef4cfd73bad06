import { PLATFORMS, PLATFORM_INFO } from '../models.js';
import type { PostRecord } from '../models.js';
import type { Calendar, DaySlot } from '../calendar.js';
import type { PostFormValues } from '../validation.js';
import { formatDayLabel, formatScheduled, formatTime } from '../dates.js';
import { escapeHtml } from './html.js';
import { layout } from './layout.js';

export const EMPTY_FORM: PostFormValues = {
  platform: PLATFORMS[0],
  caption: '',
  scheduled_datetime: '',
  link_or_asset_note: ''
};

export interface SchedulerPageOptions {
  posts: PostRecord[];
  calendar: Calendar;
  form?: PostFormValues;
  errors?: string[];
  notice?: string;
}

function platformBadge(post: PostRecord) {
  const info = PLATFORM_INFO[post.platform];
  return `<span class="badge" style="background:${info.color}">${escapeHtml(info.name)}</span>`;
}

function renderForm(values: PostFormValues, errors: string[]) {
  const options = PLATFORMS.map((p) => {
    const selected = p === values.platform ? ' selected' : '';
    return `<option value="${p}"${selected}>${escapeHtml(PLATFORM_INFO[p].name)}</option>`;
  }).join('');

  const errorList = errors.length
    ? `<ul class="form-errors" role="alert">${errors.map((e) => `<li>${escapeHtml(e)}</li>`).join('')}</ul>`
    : '';

  return `<section class="card">
<h2>Schedule a post</h2>
${errorList}
<form method="post" action="/scheduler" class="post-form">
<label>Platform <select name="platform" required>${options}</select></label>
<label>Caption <textarea name="caption" rows="4" required>${escapeHtml(values.caption)}</textarea></label>
<label>When <input type="datetime-local" name="scheduled_datetime" value="${escapeHtml(values.scheduled_datetime)}" required></label>
<label>Link or asset note <input type="text" name="link_or_asset_note" value="${escapeHtml(values.link_or_asset_note)}"></label>
<button type="submit">Schedule</button>
</form>
</section>`;
}

function renderPostRow(post: PostRecord) {
  const note = post.linkOrAssetNote ? `<p class="note">${escapeHtml(post.linkOrAssetNote)}</p>` : '';
  return `<li class="post" data-id="${escapeHtml(post.id)}">
${platformBadge(post)}
<time>${escapeHtml(formatScheduled(post.scheduledAt))}</time>
<p class="caption">${escapeHtml(post.caption)}</p>
${note}
<form method="post" action="/scheduler/posts/${encodeURIComponent(post.id)}/delete" class="inline">
<button type="submit" class="link-danger">Delete</button>
</form>
</li>`;
}

function renderList(posts: PostRecord[]) {
  const body = posts.length
    ? `<ul class="post-list">${posts.map(renderPostRow).join('')}</ul>`
    : '<p class="empty">No posts scheduled yet.</p>';
  return `<section class="card">
<h2>Upcoming posts (${posts.length})</h2>
${body}
</section>`;
}

function renderDay(day: DaySlot) {
  const classes = ['day'];
  if (day.isToday) classes.push('today');
  if (day.isPast) classes.push('past');

  const items = day.posts
    .map(
      (post) =>
        `<li style="border-color:${PLATFORM_INFO[post.platform].color}"><span class="time">${formatTime(post.scheduledAt)}</span> ${escapeHtml(PLATFORM_INFO[post.platform].name)}</li>`
    )
    .join('');

  return `<div class="${classes.join(' ')}" data-date="${day.key}">
<div class="day-label">${formatDayLabel(day.date)}</div>
<ul>${items}</ul>
</div>`;
}

function renderCalendar(calendar: Calendar) {
  return `<section class="card calendar">
<div class="calendar-header">
<a href="/scheduler?start=${calendar.prevStart}" title="Previous two weeks">&larr;</a>
<h2>${escapeHtml(calendar.label)}</h2>
<a href="/scheduler">Today</a>
<a href="/scheduler?start=${calendar.nextStart}" title="Next two weeks">&rarr;</a>
</div>
<div class="calendar-grid">${calendar.days.map(renderDay).join('')}</div>
</section>`;
}

export function schedulerPage({ posts, calendar, form = EMPTY_FORM, errors = [], notice }: SchedulerPageOptions): string {
  const flash = notice ? `<p class="notice" role="status">${escapeHtml(notice)}</p>` : '';
  return layout({
    title: 'Scheduler',
    active: 'scheduler',
    body: `${flash}
<div class="columns">
${renderForm(form, errors)}
${renderList(posts)}
</div>
${renderCalendar(calendar)}`
  });
}
