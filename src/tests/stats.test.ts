import * as test from 'node:test';
import * as assert from 'node:assert';
import { computeStatistics, formatMarkdown, formatStatistics, formatSummary, parseStatsFormat, topN } from '../stats.js';
import { makeRecord } from './helpers.js';

const { describe, it } = test;

const records = [
  makeRecord('a.md', { title: 'A', status: 'accepted', category: 'architecture', author: 'Alice', created: '2023-05-10', tags: ['db'] }),
  makeRecord('b.md', { title: 'B', status: 'accepted', category: 'security', author: 'Alice', created: '2024-01-15' }),
  makeRecord('c.md', { title: 'C', category: 'architecture', author: 'Bob', technologies: ['go'] })
];

describe('computeStatistics', () => {
  it('counts statuses for the three-record batch', () => {
    const stats = computeStatistics(records);

    assert.strictEqual(stats.totalCount, 3);
    assert.deepStrictEqual(stats.byStatus, { accepted: 2, proposed: 1, deprecated: 0, superseded: 0 });
  });

  it('counts fields, years and the date range', () => {
    const stats = computeStatistics(records);

    assert.deepStrictEqual(stats.byCategory, { architecture: 2, security: 1 });
    assert.deepStrictEqual(stats.byAuthor, { Alice: 2, Bob: 1 });
    assert.deepStrictEqual(stats.byTag, { db: 1 });
    assert.deepStrictEqual(stats.byTechnology, { go: 1 });
    assert.deepStrictEqual(stats.byProject, {});
    assert.deepStrictEqual(stats.byYear, { 2023: 1, 2024: 1 });
    assert.strictEqual(stats.earliestDate, '2023-05-10');
    assert.strictEqual(stats.latestDate, '2024-01-15');
  });

  it('omits the date range when no record has a created date', () => {
    const stats = computeStatistics([makeRecord('x.md', { title: 'X' })]);

    assert.ok(!('earliestDate' in stats));
    assert.ok(!('latestDate' in stats));
    assert.deepStrictEqual(stats.byYear, {});
  });

  it('handles an empty batch', () => {
    const stats = computeStatistics([]);

    assert.strictEqual(stats.totalCount, 0);
    assert.deepStrictEqual(stats.byStatus, { proposed: 0, accepted: 0, deprecated: 0, superseded: 0 });
  });
});

describe('topN', () => {
  it('orders by count and keeps insertion order for ties', () => {
    assert.deepStrictEqual(topN({ b: 1, a: 1, c: 2 }, 2), [['c', 2], ['b', 1]]);
    assert.deepStrictEqual(topN({ a: 1 }, 0), []);
  });
});

describe('formatting', () => {
  it('prints a text summary', () => {
    assert.strictEqual(
      formatSummary(computeStatistics(records)),
      [
        'Record Statistics',
        '=================',
        'Total: 3 records',
        'By Status: proposed (1), accepted (2)',
        'By Category: architecture (2), security (1)',
        'Authors: Alice (2), Bob (1)',
        'Date Range: 2023-05-10 -> 2024-01-15',
        ''
      ].join('\n')
    );
  });

  it('prints only the total for an empty batch', () => {
    assert.strictEqual(formatSummary(computeStatistics([])), 'Record Statistics\n=================\nTotal: 0 records\n');
  });

  it('prints markdown tables', () => {
    assert.strictEqual(
      formatMarkdown(computeStatistics(records)),
      [
        '# Record Statistics',
        '',
        '**Total records:** 3',
        '',
        '## By Status',
        '',
        '| Status | Count |',
        '|---|---|',
        '| proposed | 1 |',
        '| accepted | 2 |',
        '| deprecated | 0 |',
        '| superseded | 0 |',
        '',
        '## By Category',
        '',
        '| Category | Count |',
        '|---|---|',
        '| architecture | 2 |',
        '| security | 1 |',
        '',
        '## By Author',
        '',
        '| Author | Count |',
        '|---|---|',
        '| Alice | 2 |',
        '| Bob | 1 |',
        '',
        '## Date Range',
        '',
        '- **Earliest:** 2023-05-10',
        '- **Latest:** 2024-01-15',
        ''
      ].join('\n')
    );
  });

  it('prints JSON', () => {
    const stats = computeStatistics([makeRecord('x.md', { title: 'X', created: '2022-03-04' })]);
    const json = formatStatistics(stats, 'json');

    assert.ok(json.startsWith('{\n  "totalCount": 1,\n  "byStatus": {\n    "proposed": 1,'));
    assert.ok(json.includes('"byYear": {\n    "2022": 1\n  }'));
  });

  it('parses format names', () => {
    assert.strictEqual(parseStatsFormat('MD'), 'markdown');
    assert.strictEqual(parseStatsFormat('text'), 'text');
    assert.strictEqual(parseStatsFormat('xml'), undefined);
  });
});
