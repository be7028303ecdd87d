import * as path from 'node:path';
import fs from 'fs-extra';
import { AppConfig } from './config.js';
import { NoRecordsFoundError } from './errors.js';
import { Batch, loadRecords, failureSummary } from './loader.js';
import { AppData, buildAppData } from './server.js';
import { publicRecord } from './parser.js';
import { formatStatistics, parseStatsFormat } from './stats.js';
import { ValidationRun, formatIssue, runValidation } from './validation.js';
import { renderWiki } from './wiki.js';
import { parseViewerTheme, renderViewer } from './viewer.js';

/**
 * Where to read records from; unset fields fall back to the config
 */
export interface SourceOptions {
  input?: string;
  pattern?: string;
}

export interface StatsOptions extends SourceOptions {
  format?: string;
}

export interface ValidateOptions extends SourceOptions {
  strict?: boolean;
}

export interface WikiCommandOptions extends SourceOptions {
  output?: string;
  pagesUrl?: string;
}

export interface ExportOptions extends SourceOptions {
  output?: string;
}

export interface GenerateOptions extends SourceOptions {
  output?: string;
  title?: string;
  theme?: string;
}

/**
 * Load a batch for a command. An empty batch is an error here, not in the loader.
 */
export async function loadBatch(config: AppConfig, options: SourceOptions = {}): Promise<Batch> {
  const inputDir = options.input ?? config.inputDir;
  const batch = await loadRecords({ inputDir, pattern: options.pattern ?? config.pattern });
  if (batch.records.length === 0) {
    throw new NoRecordsFoundError(inputDir);
  }
  return batch;
}

export async function statsCommand(config: AppConfig, options: StatsOptions = {}): Promise<string> {
  const format = parseStatsFormat(options.format ?? 'text');
  if (!format) {
    throw new Error(`Unknown format '${options.format}', expected text, json or markdown`);
  }
  const { statistics } = buildAppData(await loadBatch(config, options));
  return formatStatistics(statistics, format);
}

/**
 * One line per failure and issue, then a summary line and the verdict.
 */
export function formatValidationRun(run: ValidationRun): string {
  const lines: string[] = [];
  for (const failure of run.failures) {
    lines.push(`error: ${failure.source}: ${failure.error.message} [${failure.error.kind}]`);
  }
  for (const { report } of run.reports) {
    lines.push(...report.issues.map(formatIssue));
  }
  lines.push(
    `${run.reports.length} records checked: ${run.totalErrors} errors, ${run.totalWarnings} warnings, ${run.failures.length} failures`,
    run.passed ? 'Validation passed' : 'Validation failed'
  );
  return lines.join('\n') + '\n';
}

export async function validateCommand(config: AppConfig, options: ValidateOptions = {}): Promise<ValidationRun> {
  const batch = await loadBatch(config, options);
  return runValidation(batch, { strict: options.strict });
}

/**
 * Write the wiki pages and return their paths.
 */
export async function wikiCommand(config: AppConfig, options: WikiCommandOptions = {}): Promise<string[]> {
  const batch = await loadBatch(config, options);
  const outputDir = options.output ?? config.wikiDir;
  const pages = renderWiki(batch.records, { pagesUrl: options.pagesUrl ?? config.pagesUrl });

  const written: string[] = [];
  for (const page of pages) {
    const file = path.join(outputDir, page.filename);
    await fs.outputFile(file, page.content);
    written.push(file);
  }
  return written;
}

export function exportBundle(data: AppData) {
  return {
    records: data.batch.records.map(publicRecord),
    failures: data.batch.failures.map(failureSummary),
    graph: data.graph,
    facets: data.facets,
    statistics: data.statistics
  };
}

/**
 * Write the JSON bundle and return its path.
 */
export async function exportCommand(config: AppConfig, options: ExportOptions = {}): Promise<string> {
  const data = buildAppData(await loadBatch(config, options));
  const file = options.output ?? config.exportFile;
  await fs.outputJson(file, exportBundle(data), { spaces: 2 });
  return file;
}

/**
 * Write the self-contained HTML viewer and return its path.
 */
export async function generateCommand(config: AppConfig, options: GenerateOptions = {}): Promise<string> {
  const theme = parseViewerTheme(options.theme ?? 'auto');
  if (!theme) {
    throw new Error(`Unknown theme '${options.theme}', expected light, dark or auto`);
  }
  const batch = await loadBatch(config, options);
  const data = buildAppData(batch);
  const file = options.output ?? config.viewerFile;
  const html = renderViewer(batch.records, {
    meta: {
      generated: new Date().toISOString(),
      sourceDir: options.input ?? config.inputDir
    },
    ...exportBundle(data)
  }, { title: options.title ?? config.viewerTitle, theme });
  await fs.outputFile(file, html);
  return file;
}
