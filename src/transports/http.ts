/**
 * transports/http.ts
 *
 * HTTP transport. Each request is synchronous: receive → dispatch → respond.
 * Batches queue inside the engine, so two overlapping POSTs run one after
 * the other.
 *
 * Routes:
 *   GET  /health           → Liveness check
 *   GET  /tweaks           → Catalog with applied state
 *   POST /tweaks/apply     → { ids: [...] } or { all: true } → ApplyReport
 *   POST /tweaks/restore   → RestoreReport
 *   GET  /tweaks/plan      → RestorePlan
 *   GET  /state            → EngineStatus
 *   POST /rpc              → JSON-RPC 2.0 (same methods as stdio)
 */

import express, { Request, Response, NextFunction } from 'express';
import { TweakEngine } from '../core/engine';
import { TweakBaseError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { RpcDispatcher } from './rpc';

const log = scopedLogger('transports/http');

// A full restore runs one PowerShell process per resource; give it room
const REQUEST_TIMEOUT_MS = 10 * 60 * 1000;

function selectionFrom(engine: TweakEngine, body: unknown): string[] | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  if ('all' in body && body.all === true) return engine.catalog.list().map(t => t.id);
  if ('ids' in body && Array.isArray(body.ids)) {
    const ids: unknown[] = body.ids;
    if (ids.length > 0 && ids.every((id): id is string => typeof id === 'string')) return ids;
  }
  return undefined;
}

function sendError(res: Response, e: unknown): void {
  const isTweakError = e instanceof TweakBaseError;
  res.status(500).json({
    error: {
      code: isTweakError ? e.code : 'INTERNAL_ERROR',
      message: errorMessage(e)
    }
  });
}

export function createHttpTransport(engine: TweakEngine, dispatcher: RpcDispatcher): express.Application {
  const app = express();
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setTimeout(REQUEST_TIMEOUT_MS, () => {
      log.warn({ path: req.path }, 'Request timeout');
      if (!res.headersSent) {
        res.status(503).json({ error: { code: 'TIMEOUT', message: 'The request took too long to complete' } });
      }
    });
    next();
  });

  // -----------------------------------------------------------------------
  // GET /health
  // -----------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', tweaks: engine.catalog.size });
  });

  // -----------------------------------------------------------------------
  // GET /tweaks
  // -----------------------------------------------------------------------
  app.get('/tweaks', (_req: Request, res: Response) => {
    res.json({ tweaks: engine.describe() });
  });

  // -----------------------------------------------------------------------
  // POST /tweaks/apply
  // -----------------------------------------------------------------------
  app.post('/tweaks/apply', async (req: Request, res: Response) => {
    const ids = selectionFrom(engine, req.body);
    if (!ids) {
      res.status(400).json({
        error: { code: 'INVALID_REQUEST', message: 'Provide { "ids": [non-empty list of strings] } or { "all": true }' }
      });
      return;
    }

    try {
      res.json(await engine.apply(ids));
    } catch (e) {
      log.error({ ids, error: errorMessage(e) }, 'Apply request failed');
      sendError(res, e);
    }
  });

  // -----------------------------------------------------------------------
  // POST /tweaks/restore
  // -----------------------------------------------------------------------
  app.post('/tweaks/restore', async (_req: Request, res: Response) => {
    try {
      res.json(await engine.restore());
    } catch (e) {
      log.error({ error: errorMessage(e) }, 'Restore request failed');
      sendError(res, e);
    }
  });

  // -----------------------------------------------------------------------
  // GET /tweaks/plan, GET /state
  // -----------------------------------------------------------------------
  app.get('/tweaks/plan', (_req: Request, res: Response) => {
    res.json(engine.planRestore());
  });

  app.get('/state', (_req: Request, res: Response) => {
    res.json(engine.status());
  });

  // -----------------------------------------------------------------------
  // POST /rpc
  // -----------------------------------------------------------------------
  app.post('/rpc', async (req: Request, res: Response) => {
    try {
      const response = await dispatcher.handle(req.body);
      if (response) res.json(response);
      else res.status(204).end();
    } catch (e) {
      log.error({ error: errorMessage(e) }, 'RPC request failed');
      sendError(res, e);
    }
  });

  // -----------------------------------------------------------------------
  // Error handler (malformed JSON bodies and anything a route let through)
  // -----------------------------------------------------------------------
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    log.error({ error: err.message, path: req.path, method: req.method }, 'Unhandled error in HTTP transport');

    if (!res.headersSent) {
      const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
      res.status(status).json({ error: { code: status === 400 ? 'INVALID_REQUEST' : 'INTERNAL_ERROR', message: err.message } });
    }
  });

  return app;
}
