import * as test from 'node:test';
import * as assert from 'node:assert';
import { parseHeadingAttributes, toHtml, toPlainText } from '../renderer.js';

const { describe, it } = test;

describe('toHtml', () => {
  it('renders headings and paragraphs', () => {
    assert.strictEqual(toHtml('# Context\n\nWe need a database.'), '<h1>Context</h1>\n<p>We need a database.</p>\n');
  });

  it('renders strikethrough', () => {
    assert.strictEqual(toHtml('~~old~~'), '<p><del>old</del></p>\n');
  });

  it('renders tables', () => {
    const html = toHtml('| Option | Cost |\n|---|---|\n| A | low |');

    assert.ok(html.startsWith('<table>\n<thead>\n<tr>\n<th>Option</th>'));
    assert.ok(html.includes('<td>low</td>'));
  });

  it('renders task lists', () => {
    const html = toHtml('- [x] done\n- [ ] open');

    assert.ok(html.includes('<input checked="" disabled="" type="checkbox">'));
    assert.ok(html.includes('<input disabled="" type="checkbox">'));
  });

  it('applies heading attributes', () => {
    assert.strictEqual(toHtml('## Decision {#decision .lead}'), '<h2 id="decision" class="lead">Decision</h2>\n');
  });

  it('leaves headings without attributes alone', () => {
    assert.strictEqual(toHtml('## Consequences'), '<h2>Consequences</h2>\n');
  });
});

describe('parseHeadingAttributes', () => {
  it('reads ids, classes and key-value pairs', () => {
    assert.strictEqual(parseHeadingAttributes('#intro .a .b data-level=2'), ' id="intro" class="a b" data-level="2"');
  });

  it('returns null when nothing is recognised', () => {
    assert.strictEqual(parseHeadingAttributes('not attributes'), null);
  });
});

describe('toPlainText', () => {
  it('flattens prose and inline markup', () => {
    assert.strictEqual(
      toPlainText('# Title\n\nSome *emphasis* and `code`.\nSecond line with [a link](http://example.test).'),
      'Title Some emphasis and code. Second line with a link.'
    );
  });

  it('drops fenced and indented code blocks', () => {
    assert.strictEqual(toPlainText('Before\n\n```ts\nconst x = 1;\n```\n\n    indented();\n\nAfter'), 'Before After');
  });

  it('keeps list items and table cells', () => {
    assert.strictEqual(toPlainText('- one\n- two\n\n| Name | Value |\n|---|---|\n| a | 1 |'), 'one two Name Value a 1');
  });

  it('decodes characters escaped by the lexer', () => {
    assert.strictEqual(toPlainText('Fish & chips, "quoted"'), 'Fish & chips, "quoted"');
  });

  it('drops heading attributes that toHtml applies', () => {
    assert.strictEqual(toPlainText('## Decision {#decision .lead}\n\nBody'), 'Decision Body');
  });

  it('keeps a heading suffix that holds no attributes', () => {
    assert.strictEqual(toPlainText('## Plain {nothing}'), 'Plain {nothing}');
  });

  it('flattens markup that reappears after one pass', () => {
    assert.strictEqual(toPlainText('`# TODO` later'), 'TODO later');
    assert.strictEqual(toPlainText('\\*not emphasis\\*'), 'not emphasis');
    assert.strictEqual(toPlainText('`- item`'), 'item');
  });

  it('turns hard breaks into spaces', () => {
    assert.strictEqual(toPlainText('first  \nsecond'), 'first second');
  });

  it('returns an empty string for an empty body', () => {
    assert.strictEqual(toPlainText(''), '');
    assert.strictEqual(toPlainText('   \n\n  '), '');
  });

  it('is idempotent', () => {
    const inputs = [
      '# Title\n\nSome *emphasis* and `code`.',
      '- one\n- two\n\n> quoted text',
      'Fish & chips\n\n```\nhidden\n```',
      '<div>raw</div>\n\nvisible',
      '`# TODO` later',
      '\\*not emphasis\\*',
      '`- item`',
      '&amp;lt;tag&amp;gt;'
    ];
    for (const input of inputs) {
      const once = toPlainText(input);
      assert.strictEqual(toPlainText(once), once);
    }
  });
});
