import { format, parse } from 'date-fns';
import { MdRecord, Statistics, Status } from './types.js';
import { ALL_STATUSES, statusEmoji } from './status.js';
import { ISO_DATE_FORMAT } from './metadata.js';
import { computeStatistics } from './stats.js';

/**
 * A generated wiki page
 */
export interface WikiPage {
  filename: string;
  content: string;
}

export interface WikiOptions {
  /** URL of a hosted viewer, linked from the index page */
  pagesUrl?: string;
}

function statusBadge(status: Status): string {
  return `${statusEmoji(status)} ${status}`;
}

function cell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 3)}...` : value;
}

function link(record: MdRecord): string {
  return `[${record.metadata.title}](${record.filename})`;
}

function withDescription(line: string, description: string): string {
  return description ? `${line} - ${description}` : line;
}

export function renderIndex(records: readonly MdRecord[], options: WikiOptions = {}): string {
  const lines = ['# Record Index', ''];
  if (options.pagesUrl) {
    lines.push(`> [View the interactive viewer](${options.pagesUrl})`, '');
  }
  lines.push('| ID | Title | Status | Category | Created |', '|:---|:------|:------:|:---------|:--------|');
  for (const record of records) {
    const { metadata } = record;
    lines.push(
      `| ${cell(record.id)} | [${cell(metadata.title)}](${record.filename}) | ${statusBadge(metadata.status)} | ${cell(metadata.category)} | ${metadata.created ?? '-'} |`
    );
  }
  return lines.join('\n') + '\n';
}

export function renderByStatus(records: readonly MdRecord[]): string {
  const lines = ['# Records by Status', ''];
  for (const status of ALL_STATUSES) {
    const group = records.filter(record => record.metadata.status === status);
    if (group.length === 0) {
      continue;
    }
    lines.push(`## ${statusBadge(status)}`, '');
    for (const record of group) {
      lines.push(withDescription(`- ${link(record)}`, record.metadata.description));
    }
    lines.push('');
  }
  return lines.join('\n');
}

export function renderByCategory(records: readonly MdRecord[]): string {
  const groups = new Map<string, MdRecord[]>();
  for (const record of records) {
    const category = record.metadata.category || 'Uncategorized';
    const group = groups.get(category) ?? [];
    group.push(record);
    groups.set(category, group);
  }

  const lines = ['# Records by Category', ''];
  for (const category of Array.from(groups.keys()).sort()) {
    lines.push(`## ${category}`, '');
    for (const record of groups.get(category) ?? []) {
      lines.push(withDescription(`- ${link(record)} ${statusBadge(record.metadata.status)}`, truncate(record.metadata.description, 80)));
    }
    lines.push('');
  }
  return lines.join('\n');
}

/**
 * Dated records newest first, grouped by month; undated records last.
 */
export function renderTimeline(records: readonly MdRecord[]): string {
  const dated = records
    .filter(record => record.metadata.created !== undefined)
    .sort((a, b) => (b.metadata.created ?? '').localeCompare(a.metadata.created ?? ''));
  const undated = records.filter(record => record.metadata.created === undefined);

  const lines = ['# Record Timeline'];
  let currentMonth: string | undefined;

  for (const record of dated) {
    const created = record.metadata.created ?? '';
    const month = format(parse(created, ISO_DATE_FORMAT, new Date()), 'MMMM yyyy');
    if (month !== currentMonth) {
      currentMonth = month;
      lines.push('', `## ${month}`, '');
    }
    lines.push(`- **${created}** ${link(record)} ${statusBadge(record.metadata.status)}`);
  }

  if (undated.length > 0) {
    lines.push('', '## Undated', '');
    for (const record of undated) {
      lines.push(`- ${link(record)} ${statusBadge(record.metadata.status)}`);
    }
  }
  return lines.join('\n') + '\n';
}

export function renderStatisticsPage(stats: Statistics): string {
  const lines = ['# Record Statistics', '', `**Total records:** ${stats.totalCount}`, '', '## By Status', ''];
  for (const status of ALL_STATUSES) {
    lines.push(`- ${statusBadge(status)}: ${stats.byStatus[status] ?? 0}`);
  }

  const sections: Array<[string, Record<string, number>, number]> = [
    ['By Category', stats.byCategory, Infinity],
    ['By Author', stats.byAuthor, 10]
  ];
  for (const [heading, counts, max] of sections) {
    const entries = Object.entries(counts).sort((a, b) => b[1] - a[1]).slice(0, max);
    if (entries.length === 0) {
      continue;
    }
    lines.push('', `## ${heading}`, '');
    for (const [key, count] of entries) {
      lines.push(`- ${key}: ${count}`);
    }
  }

  if (stats.earliestDate && stats.latestDate) {
    lines.push('', '## Date Range', '', `- **Earliest:** ${stats.earliestDate}`, `- **Latest:** ${stats.latestDate}`);
  }
  return lines.join('\n') + '\n';
}

/**
 * All wiki pages for a batch.
 */
export function renderWiki(records: readonly MdRecord[], options: WikiOptions = {}): WikiPage[] {
  return [
    { filename: 'Records-Index.md', content: renderIndex(records, options) },
    { filename: 'Records-By-Status.md', content: renderByStatus(records) },
    { filename: 'Records-By-Category.md', content: renderByCategory(records) },
    { filename: 'Records-Timeline.md', content: renderTimeline(records) },
    { filename: 'Records-Statistics.md', content: renderStatisticsPage(computeStatistics(records)) }
  ];
}
