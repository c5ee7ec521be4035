/**
 * Team Split Ledger - API Module Export
 */

export { createApp, AppDependencies } from './app';
export { createOwnerAuthMiddleware, callerOf } from './middleware/auth.middleware';
export { createLedgerRoutes } from './routes/ledger.routes';
