#!/usr/bin/env node

/**
 * mdrecords CLI
 *
 * Every command loads the config, then lets its own flags override it.
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config.js';
import { NoRecordsFoundError } from './errors.js';
import { moduleLogger, setGlobalLogLevel } from './logger.js';
import { buildAppData, createApp } from './server.js';
import {
  SourceOptions,
  StatsOptions,
  ValidateOptions,
  WikiCommandOptions,
  ExportOptions,
  GenerateOptions,
  loadBatch,
  statsCommand,
  validateCommand,
  formatValidationRun,
  wikiCommand,
  exportCommand,
  generateCommand
} from './commands.js';

const log = moduleLogger('[CLI] ');

interface ServeOptions extends SourceOptions {
  port?: number;
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (isNaN(port) || port <= 0) {
    throw new InvalidArgumentError('Not a valid port.');
  }
  return port;
}

/**
 * Start the API server and stop it cleanly on SIGTERM/SIGINT
 */
async function serve(options: ServeOptions): Promise<void> {
  const config = await loadConfig();
  const batch = await loadBatch(config, options);
  const app = createApp(buildAppData(batch), { logRequests: config.logRequests });
  const port = options.port ?? config.port;

  const server = app.listen(port, () => {
    log.info(`mdrecords API listening on http://localhost:${port}`);
  });

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      log.info('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      log.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

const program = new Command();

program
  .name('mdrecords')
  .description('Decode, validate and serve markdown records with YAML headers')
  .version('0.1.0')
  .option('--verbose', 'Enable debug logging')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().verbose) {
      setGlobalLogLevel('debug');
    }
  });

program
  .command('serve')
  .description('Serve the read-only HTTP API')
  .option('-i, --input <dir>', 'Directory holding the records')
  .option('--pattern <glob>', 'Glob pattern relative to the input directory')
  .option('-p, --port <port>', 'Port to listen on', parsePort)
  .action(async (options: ServeOptions) => {
    await serve(options);
  });

program
  .command('generate')
  .description('Write a self-contained HTML viewer')
  .option('-i, --input <dir>', 'Directory holding the records')
  .option('--pattern <glob>', 'Glob pattern relative to the input directory')
  .option('-o, --output <file>', 'Output file')
  .option('-t, --title <title>', 'Page title')
  .option('--theme <theme>', 'Color theme: light, dark or auto', 'auto')
  .action(async (options: GenerateOptions) => {
    const file = await generateCommand(await loadConfig(), options);
    log.info(`Wrote ${file}`);
  });

program
  .command('stats')
  .description('Print record statistics')
  .option('-i, --input <dir>', 'Directory holding the records')
  .option('--pattern <glob>', 'Glob pattern relative to the input directory')
  .option('-f, --format <format>', 'Output format: text, json or markdown', 'text')
  .action(async (options: StatsOptions) => {
    const output = await statsCommand(await loadConfig(), options);
    process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
  });

program
  .command('validate')
  .description('Validate records; exits with code 1 on failure')
  .option('-i, --input <dir>', 'Directory holding the records')
  .option('--pattern <glob>', 'Glob pattern relative to the input directory')
  .option('--strict', 'Treat warnings as failures')
  .action(async (options: ValidateOptions) => {
    const run = await validateCommand(await loadConfig(), options);
    process.stdout.write(formatValidationRun(run));
    if (!run.passed) {
      process.exitCode = 1;
    }
  });

program
  .command('wiki')
  .description('Generate wiki pages')
  .option('-i, --input <dir>', 'Directory holding the records')
  .option('--pattern <glob>', 'Glob pattern relative to the input directory')
  .option('-o, --output <dir>', 'Output directory')
  .option('--pages-url <url>', 'URL of a hosted viewer to link from the index')
  .action(async (options: WikiCommandOptions) => {
    const written = await wikiCommand(await loadConfig(), options);
    for (const file of written) {
      log.info(`Wrote ${file}`);
    }
  });

program
  .command('export')
  .description('Export records, graph, facets and statistics as JSON')
  .option('-i, --input <dir>', 'Directory holding the records')
  .option('--pattern <glob>', 'Glob pattern relative to the input directory')
  .option('-o, --output <file>', 'Output file')
  .action(async (options: ExportOptions) => {
    const file = await exportCommand(await loadConfig(), options);
    log.info(`Wrote ${file}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof NoRecordsFoundError) {
    log.error(`${err.message}; check --input and --pattern`);
  } else {
    log.error(err instanceof Error ? err.message : String(err));
  }
  process.exitCode = 1;
});
