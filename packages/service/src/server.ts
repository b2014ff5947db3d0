import dotenv from 'dotenv';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig } from './config';
import { createLogger } from './logger';
import { MetricsCollector } from './metrics';

// --- config ----------------------------------------------------------------

dotenv.config();
const config = loadConfig(process.env);
const logger = createLogger({ service: config.service, level: config.logLevel, json: config.logJson });

if (!config.apiKey) logger.warn('API_KEY not configured - authentication disabled');

// --- app setup -------------------------------------------------------------

const app = createApp({ config, logger, metrics: new MetricsCollector() });

serve({
  fetch: app.fetch,
  port: config.port,
  hostname: config.host,
}, info => {
  logger.info(`Server listening on ${config.host}:${info.port}`, { max_matrix_size: config.maxMatrixSize, batch_jobs: config.batchJobs });
});
