import { z } from 'zod';
import { DEFAULT_PROTOCOL_CONFIG, LedgerError, type LedgerProtocolConfig } from '@tessera/types';

export const LedgerProtocolConfigSchema = z.object({
  amountMode: z.enum(['public', 'denomination']),
  denomination: z.bigint().positive(),
  transferLayout: z.enum(['fixed', 'variable']),
  maxInputs: z.number().int().min(1),
  maxOutputs: z.number().int().min(1),
});

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveProtocolConfig(overrides: Partial<LedgerProtocolConfig> = {}): LedgerProtocolConfig {
  const parsed = LedgerProtocolConfigSchema.safeParse({ ...DEFAULT_PROTOCOL_CONFIG, ...overrides });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new LedgerError('InvalidConfig', `Invalid ledger config: ${detail}`);
  }
  return parsed.data;
}
