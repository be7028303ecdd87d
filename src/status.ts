import { Status } from './types.js';
import { Logger, moduleLogger } from './logger.js';

const log = moduleLogger('[Status] ');

export const DEFAULT_STATUS: Status = 'proposed';

/**
 * All statuses, in lifecycle order.
 */
export const ALL_STATUSES: readonly Status[] = ['proposed', 'accepted', 'deprecated', 'superseded'];

const STATUS_COLORS: Record<Status, string> = {
  proposed: '#f59e0b',
  accepted: '#10b981',
  deprecated: '#ef4444',
  superseded: '#6b7280'
};

const STATUS_EMOJI: Record<Status, string> = {
  proposed: '🟡',
  accepted: '🟢',
  deprecated: '🔴',
  superseded: '⚪'
};

export function isStatus(value: string): value is Status {
  return ALL_STATUSES.some(status => status === value);
}

/**
 * Case-insensitive exact match against the canonical names.
 */
export function parseStatus(value: string): Status | undefined {
  const lowered = value.toLowerCase();
  return isStatus(lowered) ? lowered : undefined;
}

export function statusCssClass(status: Status): string {
  return `status-${status}`;
}

export function statusColor(status: Status): string {
  return STATUS_COLORS[status];
}

export function statusEmoji(status: Status): string {
  return STATUS_EMOJI[status];
}

/**
 * Remembers unknown status values so each one is warned about once.
 * Keys are lowercased, so "Published" and "PUBLISHED" share a warning.
 */
export class StatusWarningTracker {
  private readonly seen = new Set<string>();

  constructor(private readonly logger: Logger = log) {}

  /**
   * Record an unknown value. Returns true when this call emitted the warning.
   */
  report(value: string): boolean {
    const key = value.toLowerCase();
    if (this.seen.has(key)) {
      return false;
    }
    this.seen.add(key);
    this.logger.warn(`Unknown status '${key}', defaulting to '${DEFAULT_STATUS}'`);
    return true;
  }

  has(value: string): boolean {
    return this.seen.has(value.toLowerCase());
  }

  get warnedValues(): string[] {
    return Array.from(this.seen);
  }

  reset(): void {
    this.seen.clear();
  }
}

/**
 * Tracker shared by every decode that does not bring its own.
 */
export const sharedStatusTracker = new StatusWarningTracker();

/**
 * Lenient status decoding: unknown non-empty values fall back to the default
 * and are reported to the tracker; empty or missing values fall back silently.
 */
export function decodeStatus(value: string, tracker: StatusWarningTracker = sharedStatusTracker): Status {
  if (value === '') {
    return DEFAULT_STATUS;
  }
  const status = parseStatus(value);
  if (status) {
    return status;
  }
  tracker.report(value);
  return DEFAULT_STATUS;
}
