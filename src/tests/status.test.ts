import * as test from 'node:test';
import * as assert from 'node:assert';
import {
  ALL_STATUSES,
  StatusWarningTracker,
  decodeStatus,
  parseStatus,
  statusColor,
  statusCssClass,
  statusEmoji
} from '../status.js';
import { registeredLoggerCount } from '../logger.js';
import { RecordingLogger } from './helpers.js';

const { describe, it } = test;

describe('parseStatus', () => {
  it('matches canonical names case-insensitively', () => {
    assert.strictEqual(parseStatus('Accepted'), 'accepted');
    assert.strictEqual(parseStatus('SUPERSEDED'), 'superseded');
    assert.strictEqual(parseStatus('published'), undefined);
  });

  it('has helpers for every status', () => {
    assert.deepStrictEqual(ALL_STATUSES.map(statusCssClass), [
      'status-proposed',
      'status-accepted',
      'status-deprecated',
      'status-superseded'
    ]);
    assert.strictEqual(statusColor('accepted'), '#10b981');
    assert.strictEqual(statusEmoji('deprecated'), '🔴');
  });
});

describe('decodeStatus', () => {
  it('defaults empty values silently', () => {
    const logger = new RecordingLogger();
    const tracker = new StatusWarningTracker(logger);

    assert.strictEqual(decodeStatus('', tracker), 'proposed');
    assert.deepStrictEqual(logger.warnings, []);
  });

  it('warns once per unknown value regardless of case', () => {
    const logger = new RecordingLogger();
    const tracker = new StatusWarningTracker(logger);

    assert.strictEqual(decodeStatus('published', tracker), 'proposed');
    assert.strictEqual(decodeStatus('PUBLISHED', tracker), 'proposed');
    assert.strictEqual(decodeStatus('Published', tracker), 'proposed');
    assert.strictEqual(decodeStatus('draft', tracker), 'proposed');

    assert.deepStrictEqual(logger.warnings, [
      "Unknown status 'published', defaulting to 'proposed'",
      "Unknown status 'draft', defaulting to 'proposed'"
    ]);
    assert.deepStrictEqual(tracker.warnedValues, ['published', 'draft']);
    assert.ok(tracker.has('Draft'));
  });

  it('warns again after reset', () => {
    const logger = new RecordingLogger();
    const tracker = new StatusWarningTracker(logger);

    assert.strictEqual(tracker.report('wip'), true);
    assert.strictEqual(tracker.report('WIP'), false);
    tracker.reset();
    assert.strictEqual(tracker.report('wip'), true);
    assert.strictEqual(logger.warnings.length, 2);
  });

  it('shares one module logger between default trackers', () => {
    const before = registeredLoggerCount();

    for (let i = 0; i < 5; i++) {
      new StatusWarningTracker().report(`unknown-${i}`);
    }

    assert.strictEqual(registeredLoggerCount(), before);
  });
});
