import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { LedgerError, type HashName, type LedgerProtocolConfig, type LogLevel } from '@tessera/types';

export interface CliConfig {
  treeDepth: number;
  hash: HashName;
  protocol: LedgerProtocolConfig;
  logLevel: LogLevel;
}

const EnvSchema = z.object({
  TESSERA_TREE_DEPTH: z.coerce.number().int().min(1).max(32).default(20),
  TESSERA_HASH: z.enum(['sha256', 'poseidon']).default('sha256'),
  TESSERA_AMOUNT_MODE: z.enum(['public', 'denomination']).default('public'),
  TESSERA_DENOMINATION: z
    .string()
    .regex(/^[1-9][0-9]*$/, 'must be a positive integer')
    .default('1000000000000000000')
    .transform((value) => BigInt(value)),
  TESSERA_TRANSFER_LAYOUT: z.enum(['fixed', 'variable']).default('fixed'),
  TESSERA_MAX_INPUTS: z.coerce.number().int().min(1).default(16),
  TESSERA_MAX_OUTPUTS: z.coerce.number().int().min(1).default(16),
  TESSERA_LOG_LEVEL: z.enum(['silent', 'debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Load Tessera configuration from environment variables.
 * Without an explicit env, .env in the working directory is read first.
 */
export function loadConfig(env?: Record<string, string | undefined>): CliConfig {
  if (env === undefined) {
    loadDotenv({ path: resolve(process.cwd(), '.env') });
  }

  const parsed = EnvSchema.safeParse(env ?? process.env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new LedgerError('InvalidConfig', `Invalid environment: ${detail}`);
  }

  const vars = parsed.data;
  return {
    treeDepth: vars.TESSERA_TREE_DEPTH,
    hash: vars.TESSERA_HASH,
    protocol: {
      amountMode: vars.TESSERA_AMOUNT_MODE,
      denomination: vars.TESSERA_DENOMINATION,
      transferLayout: vars.TESSERA_TRANSFER_LAYOUT,
      maxInputs: vars.TESSERA_MAX_INPUTS,
      maxOutputs: vars.TESSERA_MAX_OUTPUTS,
    },
    logLevel: vars.TESSERA_LOG_LEVEL,
  };
}

/** Parse a --depth option */
export function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 1 || depth > 32) {
    throw new LedgerError('InvalidTreeDepth', `Tree depth must be an integer in [1, 32], got ${value}`);
  }
  return depth;
}

/** Parse a --hash option */
export function parseHashName(value: string): HashName {
  if (value !== 'sha256' && value !== 'poseidon') {
    throw new LedgerError('InvalidConfig', `Unknown hash "${value}", expected sha256 or poseidon`);
  }
  return value;
}
