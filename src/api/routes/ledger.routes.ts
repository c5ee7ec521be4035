/**
 * Team Split Ledger - Ledger API Routes
 * Amounts travel as decimal strings of base units. A `decimals` field on a
 * deposit, or query on a summary, switches to a decimal representation.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { SplitLedger, SplitLedgerError, SplitLedgerErrorCode } from '../../core/ledger';
import { CustodyError, InMemoryCustody } from '../../modules/custody';
import { AssetSummary, WithdrawalRecord, formatUnits, parseUnits } from '../../shared/types';
import { callerOf } from '../middleware/auth.middleware';

const STATUS_BY_CODE: Record<SplitLedgerErrorCode, number> = {
  EMPTY_TEAM: 400,
  LENGTH_MISMATCH: 400,
  INVALID_ADDRESS: 400,
  BAD_PROPORTION: 400,
  NOT_OWNER: 403,
  NO_USER_PROPORTION: 404,
  NO_BALANCE_TO_WITHDRAW: 409,
  INSUFFICIENT_ENTITLEMENT: 409,
  REENTRANT_CALL: 409,
  TRANSFER_FAILED: 502,
};

const Decimals = z.coerce.number().int().min(0).max(36);

const DepositSchema = z
  .object({
    amount: z.string(),
    decimals: Decimals.optional(),
  })
  .transform((body, ctx) => {
    if (body.decimals === undefined && !/^\d+$/.test(body.amount)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'amount must be an integer string of base units' });
      return z.NEVER;
    }
    try {
      return parseUnits(body.amount, body.decimals ?? 0);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
      return z.NEVER;
    }
  });

const DisplayQuerySchema = z.object({
  decimals: Decimals.optional(),
});

const WithdrawalSchema = z.object({
  beneficiary: z.string().min(1),
});

function serializeWithdrawal(record: WithdrawalRecord) {
  return {
    id: record.id,
    beneficiary: record.beneficiary,
    asset: record.asset,
    amount: record.amount.toString(),
    tx_hash: record.tx_hash,
    created_at: record.created_at.toISOString(),
  };
}

function serializeSummary(summary: AssetSummary, decimals?: number) {
  const serialized = {
    asset: summary.asset,
    lifetime_inflow: summary.lifetime_inflow.toString(),
    on_hand: summary.on_hand.toString(),
    paid_out: summary.paid_out.toString(),
    members: summary.members.map(member => ({
      address: member.address,
      share: member.share,
      withdrawn: member.withdrawn.toString(),
      entitlement: member.entitlement.toString(),
    })),
  };

  if (decimals === undefined) {
    return serialized;
  }

  return {
    ...serialized,
    display: {
      decimals,
      lifetime_inflow: formatUnits(summary.lifetime_inflow, decimals),
      on_hand: formatUnits(summary.on_hand, decimals),
      paid_out: formatUnits(summary.paid_out, decimals),
    },
  };
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof SplitLedgerError) {
    res.status(STATUS_BY_CODE[error.code]).json({ error: error.code, message: error.message });
    return;
  }

  if (error instanceof CustodyError) {
    res.status(400).json({ error: error.code, message: error.message });
    return;
  }

  if (error instanceof z.ZodError) {
    res.status(400).json({
      error: 'INVALID_REQUEST',
      message: error.issues.map(issue => issue.message).join('; '),
    });
    return;
  }

  console.error('[API] Unexpected error:', error);
  res.status(500).json({ error: 'Internal server error' });
}

export function createLedgerRoutes(ledger: SplitLedger, custody: InMemoryCustody | null): Router {
  const router = Router();

  /**
   * GET /v1/ledger
   * Owner, accounting mode and share table
   */
  router.get('/ledger', (_req: Request, res: Response) => {
    res.json({
      owner: ledger.owner,
      accounting: ledger.accounting,
      members: ledger.members(),
    });
  });

  /**
   * GET /v1/assets/:asset/summary?decimals=N
   */
  router.get('/assets/:asset/summary', async (req: Request, res: Response) => {
    try {
      const { decimals } = DisplayQuerySchema.parse(req.query);
      const summary = await ledger.summary(req.params.asset);
      res.json(serializeSummary(summary, decimals));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /v1/assets/:asset/members/:address/entitlement
   * `raw_entitlement` is negative when the shared counter ran ahead of this asset
   */
  router.get('/assets/:asset/members/:address/entitlement', async (req: Request, res: Response) => {
    try {
      const { asset, address } = req.params;
      const raw = await ledger.rawEntitlement(asset, address);

      res.json({
        asset,
        address,
        share: ledger.shareOf(address),
        withdrawn: ledger.withdrawn(address, asset).toString(),
        entitlement: (raw > 0n ? raw : 0n).toString(),
        raw_entitlement: raw.toString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /v1/assets/:asset/deposits { amount, decimals? }
   * Mock custody only: credits custody directly, the ledger is not called
   */
  router.post('/assets/:asset/deposits', (req: Request, res: Response) => {
    if (!custody) {
      res.status(501).json({ error: 'Deposits are only accepted by the in-memory custody' });
      return;
    }

    try {
      const amount = DepositSchema.parse(req.body);
      const held = custody.deposit(req.params.asset, amount);

      res.status(201).json({ asset: req.params.asset, amount: amount.toString(), on_hand: held.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /v1/assets/:asset/withdrawals
   */
  router.post('/assets/:asset/withdrawals', async (req: Request, res: Response) => {
    try {
      const { beneficiary } = WithdrawalSchema.parse(req.body);
      const record = await ledger.withdraw(callerOf(res), req.params.asset, beneficiary);

      res.status(201).json(serializeWithdrawal(record));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /v1/assets/:asset/withdrawals/all
   */
  router.post('/assets/:asset/withdrawals/all', async (req: Request, res: Response) => {
    try {
      const records = await ledger.withdrawAll(callerOf(res), req.params.asset);

      res.status(201).json({ count: records.length, withdrawals: records.map(serializeWithdrawal) });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /v1/withdrawals
   */
  router.get('/withdrawals', (_req: Request, res: Response) => {
    res.json({ withdrawals: ledger.withdrawals().map(serializeWithdrawal) });
  });

  return router;
}
