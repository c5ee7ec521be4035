/**
 * Team Split Ledger - Express Application
 *
 * API SURFACE:
 * - GET  /health                                       (public)
 * - GET  /v1/ledger
 * - GET  /v1/assets/:asset/summary
 * - GET  /v1/assets/:asset/members/:address/entitlement
 * - POST /v1/assets/:asset/deposits                    (mock custody)
 * - POST /v1/assets/:asset/withdrawals
 * - POST /v1/assets/:asset/withdrawals/all
 * - GET  /v1/withdrawals
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { SplitLedger } from '../core/ledger';
import { AssetCustody, InMemoryCustody } from '../modules/custody';
import { createOwnerAuthMiddleware } from './middleware/auth.middleware';
import { createLedgerRoutes } from './routes/ledger.routes';

export interface AppDependencies {
  readonly ledger: SplitLedger;
  readonly custody: AssetCustody;
  readonly adminApiKey: string;
  readonly rateLimitPerMinute: number;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'OK', service: 'team-split-ledger', timestamp: new Date().toISOString() });
  });

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    limit: deps.rateLimitPerMinute,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
  });

  const mockCustody = deps.custody instanceof InMemoryCustody ? deps.custody : null;

  app.use(
    '/v1',
    limiter,
    createOwnerAuthMiddleware(deps.adminApiKey, deps.ledger.owner),
    createLedgerRoutes(deps.ledger, mockCustody)
  );

  // Error handler - malformed JSON bodies land here
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'INVALID_REQUEST', message: 'Malformed JSON body' });
      return;
    }

    console.error('[API] Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error', timestamp: new Date().toISOString() });
  });

  return app;
}
