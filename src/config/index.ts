/**
 * Team Split Ledger - Configuration
 * Environment variables, validated once at boot. FAIL LOUDLY if invalid.
 */

import { z } from 'zod';
import { TeamMember, WithdrawalAccounting } from '../shared/types';

/**
 * LEDGER_MEMBERS=0xabc...:60,0xdef...:40
 */
export const MemberListSchema = z.string().transform((value, ctx): TeamMember[] => {
  const members: TeamMember[] = [];

  for (const entry of value.split(',').map(part => part.trim()).filter(Boolean)) {
    const match = /^([^:\s]+):(\d+)$/.exec(entry);
    if (!match) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid member entry "${entry}" (expected address:share)`,
      });
      return z.NEVER;
    }
    members.push({ address: match[1], share: parseInt(match[2], 10) });
  }

  return members;
});

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  ADMIN_API_KEY: z.string().min(1, 'ADMIN_API_KEY is required'),
  LEDGER_OWNER: z.string().min(1, 'LEDGER_OWNER is required'),
  LEDGER_MEMBERS: MemberListSchema,
  WITHDRAWAL_ACCOUNTING: z.enum(['per-asset', 'shared']).default('per-asset'),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(30),
});

export interface AppConfig {
  readonly port: number;
  readonly adminApiKey: string;
  readonly owner: string;
  readonly members: TeamMember[];
  readonly accounting: WithdrawalAccounting;
  readonly rateLimitPerMinute: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    adminApiKey: data.ADMIN_API_KEY,
    owner: data.LEDGER_OWNER,
    members: data.LEDGER_MEMBERS,
    accounting: data.WITHDRAWAL_ACCOUNTING,
    rateLimitPerMinute: data.RATE_LIMIT_PER_MINUTE,
  };
}
