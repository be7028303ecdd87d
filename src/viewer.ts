import { MdRecord } from './types.js';
import { statusColor, statusCssClass, statusEmoji } from './status.js';

export type ViewerTheme = 'light' | 'dark' | 'auto';

export const VIEWER_THEMES: readonly ViewerTheme[] = ['light', 'dark', 'auto'];

export function parseViewerTheme(value: string): ViewerTheme | undefined {
  const lowered = value.toLowerCase();
  return VIEWER_THEMES.find(theme => theme === lowered);
}

export interface ViewerOptions {
  /** Page title */
  title: string;
  theme: ViewerTheme;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Serialize data for a `<script type="application/json">` block.
 * Escaping `<` keeps a `</script>` inside a record from closing the block.
 */
export function embedJson(data: unknown): string {
  return JSON.stringify(data).replace(/</g, '\\u003c');
}

const STYLES = `
:root { --bg: #ffffff; --fg: #1f2937; --muted: #6b7280; --border: #e5e7eb; }
[data-theme="dark"] { --bg: #111827; --fg: #f3f4f6; --muted: #9ca3af; --border: #374151; }
@media (prefers-color-scheme: dark) {
  [data-theme="auto"] { --bg: #111827; --fg: #f3f4f6; --muted: #9ca3af; --border: #374151; }
}
body { margin: 0; font-family: system-ui, sans-serif; background: var(--bg); color: var(--fg); }
header.page { padding: 1rem 2rem; border-bottom: 1px solid var(--border); }
main { display: grid; grid-template-columns: 18rem 1fr; }
nav { padding: 1rem; border-right: 1px solid var(--border); }
nav ul { list-style: none; padding: 0; }
nav li[hidden] { display: none; }
article { padding: 1rem 2rem; border-bottom: 1px solid var(--border); }
article[hidden] { display: none; }
.meta { color: var(--muted); font-size: 0.9rem; }
.badge { border-radius: 0.25rem; padding: 0 0.4rem; color: #ffffff; }
`;

// Filters the list and the articles by the search box and status select
const SCRIPT = `
(function () {
  var data = JSON.parse(document.getElementById('records-data').textContent);
  var search = document.getElementById('search');
  var status = document.getElementById('status-filter');
  function apply() {
    var q = search.value.toLowerCase();
    var s = status.value;
    data.records.forEach(function (record) {
      var text = (record.metadata.title + ' ' + record.bodyText).toLowerCase();
      var show = (!q || text.indexOf(q) !== -1) && (!s || record.metadata.status === s);
      document.querySelectorAll('[data-record="' + record.id + '"]').forEach(function (el) {
        el.hidden = !show;
      });
    });
  }
  search.addEventListener('input', apply);
  status.addEventListener('change', apply);
})();
`;

function renderNavItem(record: MdRecord): string {
  return `<li data-record="${escapeHtml(record.id)}"><a href="#${escapeHtml(record.id)}">${statusEmoji(record.metadata.status)} ${escapeHtml(record.metadata.title)}</a></li>`;
}

function renderArticle(record: MdRecord): string {
  const { metadata } = record;
  const details = [metadata.category, metadata.created ?? '', metadata.tags.join(', ')].filter(Boolean);
  const meta = details.length > 0 ? ` · ${escapeHtml(details.join(' · '))}` : '';
  return [
    `<article id="${escapeHtml(record.id)}" class="record ${statusCssClass(metadata.status)}" data-record="${escapeHtml(record.id)}">`,
    `<h2>${escapeHtml(metadata.title)}</h2>`,
    `<p class="meta"><span class="badge" style="background: ${statusColor(metadata.status)}">${metadata.status}</span>${meta}</p>`,
    record.bodyHtml,
    '</article>'
  ].join('\n');
}

/**
 * Render a single self-contained HTML page: every record's rendered body,
 * plus `data` embedded as JSON for the page script.
 */
export function renderViewer(records: readonly MdRecord[], data: unknown, options: ViewerOptions): string {
  const statusOptions = Array.from(new Set(records.map(record => record.metadata.status)))
    .map(status => `<option value="${status}">${status}</option>`)
    .join('');

  return [
    '<!DOCTYPE html>',
    `<html lang="en" data-theme="${options.theme}">`,
    '<head>',
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(options.title)}</title>`,
    `<style>${STYLES}</style>`,
    '</head>',
    '<body>',
    `<header class="page"><h1>${escapeHtml(options.title)}</h1>`,
    `<input id="search" type="search" placeholder="Search records">`,
    `<select id="status-filter"><option value="">All statuses</option>${statusOptions}</select>`,
    '</header>',
    '<main>',
    `<nav><ul>${records.map(renderNavItem).join('')}</ul></nav>`,
    '<section>',
    ...records.map(renderArticle),
    '</section>',
    '</main>',
    `<script type="application/json" id="records-data">${embedJson(data)}</script>`,
    `<script>${SCRIPT}</script>`,
    '</body>',
    '</html>',
    ''
  ].join('\n');
}
