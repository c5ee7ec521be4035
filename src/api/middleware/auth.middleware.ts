/**
 * Team Split Ledger - Authentication Middleware
 * The admin API key authenticates the caller as the ledger owner.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

export function createOwnerAuthMiddleware(expectedKey: string, owner: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedKey) {
      console.error('[Auth] ADMIN_API_KEY not configured');
      res.status(503).json({ error: 'Service not configured' });
      return;
    }

    const apiKey = req.headers['x-api-key'];

    if (!apiKey) {
      res.status(401).json({ error: 'Missing API key' });
      return;
    }

    if (apiKey !== expectedKey) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    res.locals.caller = owner;
    next();
  };
}

/**
 * Identity set by createOwnerAuthMiddleware
 */
export function callerOf(res: Response): string {
  const caller: unknown = res.locals.caller;
  if (typeof caller !== 'string') {
    throw new Error('Request is not authenticated');
  }
  return caller;
}
