import express, { Application } from 'express';
import morgan from 'morgan';
import { Facets, Graph, Statistics } from './types.js';
import { Batch } from './loader.js';
import { buildGraph } from './graph.js';
import { computeFacets } from './facets.js';
import { computeStatistics } from './stats.js';
import { createApiRoutes } from './routes/api.js';

/**
 * A loaded batch with its derived views, computed once at startup
 */
export interface AppData {
  batch: Batch;
  graph: Graph;
  facets: Facets;
  statistics: Statistics;
}

export interface AppOptions {
  /** Log each request with morgan (default: false) */
  logRequests?: boolean;
}

export function buildAppData(batch: Batch): AppData {
  return {
    batch,
    graph: buildGraph(batch.records),
    facets: computeFacets(batch.records),
    statistics: computeStatistics(batch.records)
  };
}

/**
 * Create and configure the Express application
 */
export function createApp(data: AppData, options: AppOptions = {}): Application {
  const app = express();

  if (options.logRequests) {
    app.use(morgan('dev'));
  }

  // API routes
  app.use('/api', createApiRoutes(data));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      records: data.batch.records.length,
      failures: data.batch.failures.length
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
