import express, {Express} from 'express';
import {ProcessingResult, ProcessOrderRequest} from '../domain';
import {ReportConfig} from '../effects/types';
import {Logger, logger as defaultLogger} from '../logger';
import {parseProcessOrderBody} from './orderSchema';

export type OrderProcessor = {
  processOrder(request: ProcessOrderRequest): Promise<ProcessingResult>;
  getAvailableStrategies(): Array<{ name: string; description: string }>;
};

export type RouteResponse = {
  readonly status: number;
  readonly body: unknown;
};

export function healthRoute(): RouteResponse {
  return {status: 200, body: {status: 'healthy', service: 'retail-order-audit'}};
}

export function strategiesRoute(processor: OrderProcessor): RouteResponse {
  return {status: 200, body: {strategies: processor.getAvailableStrategies()}};
}

/**
 * 400 for a malformed body, 422 when processing fails, 200 on success.
 */
export async function processOrderRoute(
  processor: OrderProcessor,
  config: ReportConfig,
  body: unknown
): Promise<RouteResponse> {
  return parseProcessOrderBody(body).caseOf<Promise<RouteResponse>>({
    Left: issues => Promise.resolve({status: 400, body: {error: 'Invalid order request', issues}}),
    Right: async request => {
      const result = await processor.processOrder({...request, outputPath: config.outputPath});
      return {status: result.success ? 200 : 422, body: result};
    },
  });
}

export function createApp(processor: OrderProcessor, config: ReportConfig, log: Logger = defaultLogger): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json({limit: '1mb'}));

  app.get('/health', (_req, res) => {
    const {status, body} = healthRoute();
    res.status(status).json(body);
  });

  app.get('/api/strategies', (_req, res) => {
    const {status, body} = strategiesRoute(processor);
    res.status(status).json(body);
  });

  /**
   * POST /api/orders/process
   *
   * Runs the full workflow synchronously and returns the processing result
   */
  app.post('/api/orders/process', (req, res) => {
    processOrderRoute(processor, config, req.body)
      .then(({status, body}) => {
        res.status(status).json(body);
      })
      .catch((error: unknown) => {
        log.error('Failed to process order request', error);
        res.status(500).json({
          error: 'Failed to process order',
          details: error instanceof Error ? error.message : String(error),
        });
      });
  });

  return app;
}
