import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { ExpenseService } from './expenses';
import { ApiError, CategoryTotal, ServiceError, ServiceResult } from './types';

type Handler = (req: Request, res: Response) => Promise<unknown>;

// body-parser tags the errors it raises with a `type`
type BodyParserError = Error & { type?: string };

const STATUS_BY_KIND: Record<ServiceError['kind'], number> = {
  validation: 400,
  not_found: 404,
  storage: 500
};

function toApiError(error: ServiceError): ApiError {
  if (error.kind === 'validation' && error.details.length > 0) {
    return { error: error.message, details: error.details };
  }
  return { error: error.message };
}

function send<T>(res: Response, result: ServiceResult<T>): Response {
  if (!result.ok) {
    return res.status(STATUS_BY_KIND[result.error.kind]).json(toApiError(result.error));
  }
  return res.json(result.value);
}

// Express 4 does not catch rejected promises from handlers
function handle(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

// Category → total in summary order. Written by hand: a plain object would
// move integer-like keys such as "2024" to the front.
function sendSummary(res: Response, result: ServiceResult<CategoryTotal[]>): Response {
  if (!result.ok) {
    return send(res, result);
  }
  const pairs = result.value.map(
    entry => `${JSON.stringify(entry.category)}:${JSON.stringify(entry.total)}`
  );
  return res.type('json').send(`{${pairs.join(',')}}`);
}

export function createApp(service: ExpenseService): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  app.get('/', (_req: Request, res: Response) => {
    return res.json({ message: 'Expense tracker API is running' });
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    return res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // POST /expenses - Create a new expense
  app.post('/expenses', handle(async (req, res) => send(res, await service.create(req.body))));

  // GET /expenses - List every expense, 404 when there are none
  app.get('/expenses', handle(async (_req, res) => send(res, await service.listAll())));

  // GET /expenses/summary/:minAmount - Totals per category above a threshold
  app.get(
    '/expenses/summary',
    handle(async (_req, res) => sendSummary(res, await service.summarize()))
  );
  app.get(
    '/expenses/summary/:minAmount',
    handle(async (req, res) => sendSummary(res, await service.summarize(req.params.minAmount)))
  );

  // GET /expenses/search?q= - Exact, case-insensitive category match
  app.get('/expenses/search', handle(async (req, res) => send(res, await service.search(req.query.q))));

  // GET /expenses/datefilter?start_date=&end_date= - Inclusive date range
  app.get(
    '/expenses/datefilter',
    handle(async (req, res) =>
      send(res, await service.filterByDate(req.query.start_date, req.query.end_date))
    )
  );

  // GET /expenses/category/:category - Case-insensitive category filter
  app.get('/expenses/category', handle(async (_req, res) => send(res, await service.listByCategory(''))));
  app.get(
    '/expenses/category/:category',
    handle(async (req, res) => send(res, await service.listByCategory(req.params.category)))
  );

  // GET /expenses/id/:id - Fetch one expense
  app.get('/expenses/id/:id', handle(async (req, res) => send(res, await service.get(req.params.id))));

  // GET /expenses/:category - Short form of the category filter
  app.get(
    '/expenses/:category',
    handle(async (req, res) => send(res, await service.listByCategory(req.params.category)))
  );

  // PUT /expenses/:id - Update some or all fields of an expense
  app.put('/expenses', handle(async (req, res) => send(res, await service.update(undefined, req.body))));
  app.put(
    '/expenses/:id',
    handle(async (req, res) => send(res, await service.update(req.params.id, req.body)))
  );

  // DELETE /expenses/:id - Delete an expense
  app.delete('/expenses', handle(async (_req, res) => send(res, await service.delete(undefined))));
  app.delete('/expenses/:id', handle(async (req, res) => send(res, await service.delete(req.params.id))));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    return res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: BodyParserError, _req: Request, res: Response, _next: NextFunction) => {
    if (err.type === 'entity.parse.failed') {
      return res.status(400).json({ error: 'Request body must be valid JSON' });
    }
    console.error('Unhandled error:', err);
    return res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
