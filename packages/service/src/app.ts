import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { requestId } from 'hono/request-id';
import type { CostMatrix, Problem, SolveResult } from '@hopnet/shared';
import { LIMITS } from '@hopnet/shared';
import { solve, validateCostMatrix, InvalidMatrixError } from '@hopnet/solver';
import { runBatch, validateBatch, InvalidBatchError } from '@hopnet/batch-runner';
import type { SpawnWorker } from '@hopnet/batch-runner';
import type { ServiceConfig } from './config';
import type { Logger } from './logger';
import { MetricsCollector } from './metrics';
import { accessLog, apiKeyAuth, type AppEnv } from './middleware';

export type AppDeps = {
  config: ServiceConfig;
  logger: Logger;
  metrics?: MetricsCollector;
  solver?: typeof solve;
  spawnWorker?: SpawnWorker;
};

type Body = { ok: true; data: unknown } | { ok: false; error: string };

/** Empty body and malformed JSON are told apart, the way clients see them. */
async function readBody(c: Context<AppEnv>): Promise<Body> {
  const text = await c.req.text();
  if (text.trim() === '') return { ok: false, error: 'No JSON provided in request body' };
  try {
    return { ok: true, data: JSON.parse(text) };
  } catch {
    return { ok: false, error: 'Invalid JSON format' };
  }
}

function field(data: unknown, name: string): { found: true; value: unknown } | { found: false } {
  if (typeof data !== 'object' || data === null || Array.isArray(data) || !(name in data)) return { found: false };
  return { found: true, value: Object.getOwnPropertyDescriptor(data, name)?.value };
}

function checkMatrix(value: unknown, maxSize: number): { ok: true; cost: CostMatrix } | { ok: false; error: InvalidMatrixError } {
  try {
    return { ok: true, cost: validateCostMatrix(value, maxSize) };
  } catch (e) {
    if (e instanceof InvalidMatrixError) return { ok: false, error: e };
    throw e;
  }
}

function checkBatch(value: unknown): { ok: true; problems: Problem[] } | { ok: false; error: InvalidBatchError } {
  try {
    return { ok: true, problems: validateBatch(value) };
  } catch (e) {
    if (e instanceof InvalidBatchError) return { ok: false, error: e };
    throw e;
  }
}

function toWire(result: SolveResult, cost: unknown) {
  return {
    assignments: [...result.assignment],
    total_cost: result.totalCost,
    iterations: result.iterations,
    converged: result.converged,
    cost_matrix: cost,
  };
}

export function createApp(deps: AppDeps) {
  const { config, logger } = deps;
  const metrics = deps.metrics ?? new MetricsCollector();
  const solver = deps.solver ?? solve;
  const maxBytes = Math.floor(config.maxBodyMb * 1024 * 1024);

  const app = new Hono<AppEnv>();

  app.use('*', requestId());
  app.use('*', cors({ origin: '*', allowHeaders: ['Content-Type', 'X-API-Key', 'Authorization', 'X-Request-Id'] }));
  app.use('*', accessLog(metrics, logger));
  app.use('/solve', apiKeyAuth(config.apiKey, logger));
  app.use('/solve/*', apiKeyAuth(config.apiKey, logger));
  const limit = bodyLimit({
    maxSize: maxBytes,
    onError: c => c.json({
      success: false,
      error: `Request body exceeds ${config.maxBodyMb} MB`,
      request_id: c.get('requestId'),
    }, 413),
  });
  app.use('/solve', limit);
  app.use('/solve/*', limit);

  app.onError((err, c) => {
    logger.error('Unhandled error', { request_id: c.get('requestId'), error: err.message, stack: err.stack });
    return c.json({
      success: false,
      error: `Internal server error: ${err.message}`,
      request_id: c.get('requestId'),
    }, 500);
  });

  app.notFound(c => c.json({ success: false, error: 'Not found', request_id: c.get('requestId') }, 404));

  // --- health & info ----------------------------------------------------------

  app.get('/health', c => c.json({
    status: 'healthy',
    service: config.service,
    version: config.version,
    timestamp: new Date().toISOString(),
  }));
  app.get('/health/live', c => c.json({ status: 'alive' }));
  app.get('/health/ready', c => c.json({ status: 'ready' }));
  app.get('/metrics', c => c.json(metrics.snapshot()));
  app.get('/validation/info', c => c.json({
    matrix_size: { min: LIMITS.MIN_MATRIX_SIZE, max: config.maxMatrixSize },
    cost_value: { min: LIMITS.MIN_COST, max: LIMITS.MAX_COST },
    batch_size: { max: LIMITS.MAX_BATCH },
    request_size_mb: { max: config.maxBodyMb },
  }));

  // --- solving ----------------------------------------------------------------

  app.post('/solve', async c => {
    const request_id = c.get('requestId');
    const body = await readBody(c);
    if (!body.ok) return c.json({ success: false, error: body.error, request_id }, 400);

    const input = field(body.data, 'cost_matrix');
    if (!input.found) return c.json({ success: false, error: "Field 'cost_matrix' is required", request_id }, 400);

    const checked = checkMatrix(input.value, config.maxMatrixSize);
    if (!checked.ok) {
      logger.warn('Validation error', { request_id, code: checked.error.code, error: checked.error.message });
      return c.json({ success: false, error: checked.error.message, request_id }, 400);
    }
    const { cost } = checked;

    const n = cost.length;
    logger.info(`Solving ${n}x${n} assignment problem`, { request_id, matrix_size: n });
    const t0 = performance.now();
    const result = solver(cost, { maxSize: config.maxMatrixSize });
    const solveMs = performance.now() - t0;
    metrics.recordSolve(result.iterations, n, solveMs);
    logger.info('Problem solved', {
      request_id,
      matrix_size: n,
      iterations: result.iterations,
      converged: result.converged,
      total_cost: result.totalCost,
      solve_duration_ms: Number(solveMs.toFixed(2)),
    });

    return c.json({ success: true, result: toWire(result, cost), request_id });
  });

  app.post('/solve/batch', async c => {
    const request_id = c.get('requestId');
    const body = await readBody(c);
    if (!body.ok) return c.json({ success: false, error: body.error, request_id }, 400);

    const input = field(body.data, 'problems');
    if (!input.found) return c.json({ success: false, error: "Field 'problems' is required", request_id }, 400);

    const checked = checkBatch(input.value);
    if (!checked.ok) return c.json({ success: false, error: checked.error.message, request_id }, 400);
    const { problems } = checked;

    metrics.recordBatch(problems.length);
    logger.info(`Processing batch of ${problems.length} problems`, { request_id, batch_size: problems.length });

    const { results, summary } = await runBatch(problems, {
      options: { maxSize: config.maxMatrixSize },
      jobs: config.batchJobs,
      spawnWorker: deps.spawnWorker,
    });

    const items = results.map((r, i) => {
      if (!r.success) return { id: r.id, success: false, error: r.error };
      metrics.recordSolve(r.result.iterations, r.result.assignment.length);
      return { id: r.id, success: true, result: toWire(r.result, problems[i].costMatrix) };
    });
    logger.info(`Batch processing complete: ${summary.successful}/${summary.total} successful`, {
      request_id,
      ...summary,
    });

    return c.json({ success: true, results: items, summary, request_id });
  });

  return app;
}
