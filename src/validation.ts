import { MdRecord, Severity, ValidationIssue } from './types.js';
import type { Batch, DecodeFailure } from './loader.js';

/**
 * A named, side-effect-free check over one record.
 */
export interface ValidationRule {
  readonly name: string;
  readonly description: string;
  validate(record: MdRecord): ValidationIssue[];
}

export function errorIssue(source: string, message: string, rule: string): ValidationIssue {
  return { severity: 'error', source, message, rule };
}

export function warningIssue(source: string, message: string, rule: string): ValidationIssue {
  return { severity: 'warning', source, message, rule };
}

/**
 * `error: docs/adr-1.md:12: message [rule]`
 */
export function formatIssue(issue: ValidationIssue): string {
  const location = issue.line !== undefined ? `:${issue.line}` : '';
  return `${issue.severity}: ${issue.source}${location}: ${issue.message} [${issue.rule}]`;
}

/**
 * Ordered issues produced by one or more rules. Issues are never deduplicated.
 */
export class ValidationReport {
  private readonly items: ValidationIssue[];

  constructor(issues: ValidationIssue[] = []) {
    this.items = [...issues];
  }

  get issues(): readonly ValidationIssue[] {
    return this.items;
  }

  add(...issues: ValidationIssue[]): void {
    this.items.push(...issues);
  }

  merge(other: ValidationReport): void {
    this.items.push(...other.items);
  }

  issuesBySeverity(severity: Severity): ValidationIssue[] {
    return this.items.filter(issue => issue.severity === severity);
  }

  get errors(): ValidationIssue[] {
    return this.issuesBySeverity('error');
  }

  get warnings(): ValidationIssue[] {
    return this.issuesBySeverity('warning');
  }

  get errorCount(): number {
    return this.errors.length;
  }

  get warningCount(): number {
    return this.warnings.length;
  }

  hasErrors(): boolean {
    return this.errorCount > 0;
  }

  /**
   * Valid means no errors. Warnings alone never invalidate a report.
   */
  isValid(): boolean {
    return !this.hasErrors();
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  get size(): number {
    return this.items.length;
  }
}

/**
 * Errors when the title is empty. The decoder already rejects such records,
 * so this only fires for records assembled some other way.
 */
export const requiredFieldsRule: ValidationRule = {
  name: 'required-fields',
  description: 'Checks that required metadata fields are present',
  validate(record) {
    if (record.metadata.title === '') {
      return [errorIssue(record.source, "missing required field 'title'", this.name)];
    }
    return [];
  }
};

export const recommendedFieldsRule: ValidationRule = {
  name: 'recommended-fields',
  description: 'Warns about missing recommended metadata fields',
  validate(record) {
    const issues: ValidationIssue[] = [];
    const { metadata } = record;
    if (metadata.description === '') {
      issues.push(warningIssue(record.source, "missing recommended field 'description'", this.name));
    }
    if (metadata.created === undefined) {
      issues.push(warningIssue(record.source, "missing recommended field 'created'", this.name));
    }
    if (metadata.category === '') {
      issues.push(warningIssue(record.source, "missing recommended field 'category'", this.name));
    }
    return issues;
  }
};

export function defaultRules(): ValidationRule[] {
  return [requiredFieldsRule, recommendedFieldsRule];
}

/**
 * Runs an ordered list of rules over records.
 */
export class ValidationEngine {
  private readonly ruleList: ValidationRule[];

  constructor(rules: ValidationRule[] = defaultRules()) {
    this.ruleList = [...rules];
  }

  get rules(): readonly ValidationRule[] {
    return this.ruleList;
  }

  addRule(rule: ValidationRule): void {
    this.ruleList.push(rule);
  }

  /**
   * Issues of every rule, in rule order.
   */
  validate(record: MdRecord): ValidationReport {
    const report = new ValidationReport();
    for (const rule of this.ruleList) {
      report.add(...rule.validate(record));
    }
    return report;
  }

  /**
   * Per-record reports concatenated in batch order.
   */
  validateAll(records: readonly MdRecord[]): ValidationReport {
    const report = new ValidationReport();
    for (const record of records) {
      report.merge(this.validate(record));
    }
    return report;
  }
}

export interface RecordReport {
  source: string;
  report: ValidationReport;
}

export interface ValidationRun {
  reports: RecordReport[];
  failures: DecodeFailure[];
  totalErrors: number;
  totalWarnings: number;
  /** No errors and no decode failures; under `strict`, no warnings either */
  passed: boolean;
}

export interface RunValidationOptions {
  strict?: boolean;
  engine?: ValidationEngine;
}

/**
 * Validate a loaded batch. Whether warnings fail the run is the caller's
 * policy, passed in as `strict`.
 */
export function runValidation(batch: Batch, options: RunValidationOptions = {}): ValidationRun {
  const engine = options.engine ?? new ValidationEngine();
  const reports = batch.records.map(record => ({ source: record.source, report: engine.validate(record) }));

  let totalErrors = 0;
  let totalWarnings = 0;
  for (const { report } of reports) {
    totalErrors += report.errorCount;
    totalWarnings += report.warningCount;
  }

  const clean = totalErrors === 0 && batch.failures.length === 0;
  const passed = options.strict ? clean && totalWarnings === 0 : clean;

  return { reports, failures: batch.failures, totalErrors, totalWarnings, passed };
}
