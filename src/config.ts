/**
 * Configuration module.
 *
 * Loads mdrecords.config.{MDRECORDS_CONFIG}.json (or mdrecords.config.json)
 * from the working directory, then applies environment overrides.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { moduleLogger } from './logger.js';
import { DEFAULT_PATTERN } from './loader.js';

const log = moduleLogger('[Config] ');

export interface AppConfig {
  /** Directory holding the record files */
  inputDir: string;
  /** Glob pattern, relative to inputDir */
  pattern: string;
  /** Port for `serve` */
  port: number;
  /** Output directory for `wiki` */
  wikiDir: string;
  /** Output file for `export` */
  exportFile: string;
  /** Output file for `generate` */
  viewerFile: string;
  /** Page title for `generate` */
  viewerTitle: string;
  /** Log each HTTP request */
  logRequests: boolean;
  /** Hosted viewer linked from wiki pages */
  pagesUrl?: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  inputDir: 'docs/decisions',
  pattern: DEFAULT_PATTERN,
  port: 3000,
  wikiDir: 'wiki',
  exportFile: 'records.json',
  viewerFile: 'adrs.html',
  viewerTitle: 'Architecture Decision Records',
  logRequests: true
};

export function configFileName(env: NodeJS.ProcessEnv = process.env): string {
  const configEnv = env['MDRECORDS_CONFIG'];
  return configEnv ? `mdrecords.config.${configEnv}.json` : 'mdrecords.config.json';
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the recognised keys with the right types.
 */
export function pickConfig(raw: unknown): Partial<AppConfig> {
  if (!isObject(raw)) {
    return {};
  }
  const picked: Partial<AppConfig> = {};
  if (typeof raw['inputDir'] === 'string') picked.inputDir = raw['inputDir'];
  if (typeof raw['pattern'] === 'string') picked.pattern = raw['pattern'];
  if (typeof raw['port'] === 'number') picked.port = raw['port'];
  if (typeof raw['wikiDir'] === 'string') picked.wikiDir = raw['wikiDir'];
  if (typeof raw['exportFile'] === 'string') picked.exportFile = raw['exportFile'];
  if (typeof raw['viewerFile'] === 'string') picked.viewerFile = raw['viewerFile'];
  if (typeof raw['viewerTitle'] === 'string') picked.viewerTitle = raw['viewerTitle'];
  if (typeof raw['logRequests'] === 'boolean') picked.logRequests = raw['logRequests'];
  if (typeof raw['pagesUrl'] === 'string') picked.pagesUrl = raw['pagesUrl'];
  return picked;
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<AppConfig> {
  const overrides: Partial<AppConfig> = {};
  const port = Number(env['PORT']);
  if (env['PORT'] && Number.isInteger(port) && port > 0) {
    overrides.port = port;
  }
  if (env['MDRECORDS_INPUT']) {
    overrides.inputDir = env['MDRECORDS_INPUT'];
  }
  return overrides;
}

/**
 * Load configuration. A missing file falls back to defaults; a file that is
 * not valid JSON is an error.
 */
export async function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const fileName = configFileName(env);
  const configPath = path.join(cwd, fileName);

  let fromFile: Partial<AppConfig> = {};
  if (await fs.pathExists(configPath)) {
    const raw: unknown = await fs.readJson(configPath);
    fromFile = pickConfig(raw);
    log.debug(`Loaded config from ${fileName}`);
  } else {
    log.debug(`Config file ${fileName} not found, using defaults`);
  }

  return { ...DEFAULT_CONFIG, ...fromFile, ...envOverrides(env) };
}
