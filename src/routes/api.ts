import { Router, Request, Response } from 'express';
import { MdRecord } from '../types.js';
import type { AppData } from '../server.js';
import { publicRecord } from '../parser.js';
import { neighbors } from '../graph.js';
import { searchRecords, SearchOptions, failureSummary } from '../loader.js';
import { parseStatus } from '../status.js';
import { formatStatistics, parseStatsFormat } from '../stats.js';
import { runValidation } from '../validation.js';

function parseLimit(value: unknown): number | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const n = parseInt(value, 10);
  return !isNaN(n) && n > 0 ? n : undefined;
}

function summary(record: MdRecord) {
  const { metadata } = record;
  return {
    id: record.id,
    filename: record.filename,
    title: metadata.title,
    description: metadata.description,
    status: metadata.status,
    category: metadata.category,
    tags: metadata.tags,
    created: metadata.created
  };
}

/**
 * Create read-only API routes over a loaded batch
 */
export function createApiRoutes(data: AppData): Router {
  const router = Router();
  const { records, failures } = data.batch;

  function findRecord(id: string): MdRecord | undefined {
    return records.find(record => record.id === id);
  }

  /**
   * GET /api/records
   * List records, optionally filtered
   * Query params: ?status=accepted&category=api&tag=database&limit=10
   */
  router.get('/records', (req: Request, res: Response) => {
    const { status, category, tag, limit } = req.query;

    let result = records;

    if (typeof status === 'string') {
      result = result.filter(r => r.metadata.status === status.toLowerCase());
    }
    if (typeof category === 'string') {
      result = result.filter(r => r.metadata.category === category);
    }
    if (typeof tag === 'string') {
      result = result.filter(r => r.metadata.tags.includes(tag));
    }

    const n = parseLimit(limit);
    if (n !== undefined) {
      result = result.slice(0, n);
    }

    res.json(result.map(summary));
  });

  /**
   * GET /api/record/:id
   * Get a single record, with rendered HTML and plain text
   */
  router.get('/record/:id', (req: Request, res: Response) => {
    const { id } = req.params;
    const record = findRecord(id);

    if (!record) {
      res.status(404).json({ error: `Record not found: ${id}` });
      return;
    }

    res.json(publicRecord(record));
  });

  /**
   * GET /api/record/:id/source
   * Raw markdown body of a record
   */
  router.get('/record/:id/source', (req: Request, res: Response) => {
    const { id } = req.params;
    const record = findRecord(id);

    if (!record) {
      res.status(404).json({ error: `Record not found: ${id}` });
      return;
    }

    res.type('text/markdown').send(record.bodyMarkdown);
  });

  router.get('/graph', (_req: Request, res: Response) => {
    res.json(data.graph);
  });

  /**
   * GET /api/graph/:id/neighbors
   * Edges leaving and entering one node
   */
  router.get('/graph/:id/neighbors', (req: Request, res: Response) => {
    const { id } = req.params;

    if (!data.graph.nodes.some(node => node.id === id)) {
      res.status(404).json({ error: `Node not found: ${id}` });
      return;
    }

    res.json(neighbors(data.graph, id));
  });

  router.get('/facets', (_req: Request, res: Response) => {
    res.json(data.facets);
  });

  /**
   * GET /api/stats
   * Query params: ?format=json|text|markdown (default json)
   */
  router.get('/stats', (req: Request, res: Response) => {
    const { format } = req.query;
    const parsed = typeof format === 'string' ? parseStatsFormat(format) : 'json';

    if (!parsed) {
      res.status(400).json({ error: `Unknown format: ${String(format)}` });
      return;
    }
    if (parsed === 'json') {
      res.json(data.statistics);
      return;
    }

    res.type(parsed === 'markdown' ? 'text/markdown' : 'text/plain').send(formatStatistics(data.statistics, parsed));
  });

  /**
   * GET /api/validation
   * Query params: ?strict=true
   */
  router.get('/validation', (req: Request, res: Response) => {
    const strict = req.query['strict'] === 'true';
    const run = runValidation(data.batch, { strict });

    res.json({
      passed: run.passed,
      totalErrors: run.totalErrors,
      totalWarnings: run.totalWarnings,
      reports: run.reports.map(({ source, report }) => ({
        source,
        valid: report.isValid(),
        issues: report.issues
      })),
      failures: run.failures.map(failureSummary)
    });
  });

  /**
   * GET /api/search
   * Search titles, metadata and body text
   * Query params: ?q=database&status=accepted&limit=20
   */
  router.get('/search', (req: Request, res: Response) => {
    const { q, status, limit } = req.query;

    if (!q || typeof q !== 'string') {
      res.status(400).json({ error: 'Query parameter "q" is required' });
      return;
    }

    const options: SearchOptions = {};

    if (typeof status === 'string') {
      const parsed = parseStatus(status);
      if (!parsed) {
        res.status(400).json({ error: `Unknown status: ${status}` });
        return;
      }
      options.status = parsed;
    }

    const n = parseLimit(limit);
    if (n !== undefined) {
      options.limit = n;
    }

    const results = searchRecords(q, records, options);

    res.json(results.map(r => ({
      id: r.record.id,
      title: r.record.metadata.title,
      status: r.record.metadata.status,
      snippet: r.snippet,
      matchType: r.matchType
    })));
  });

  /**
   * GET /api/failures
   * Sources that could not be decoded
   */
  router.get('/failures', (_req: Request, res: Response) => {
    res.json(failures.map(failureSummary));
  });

  return router;
}
