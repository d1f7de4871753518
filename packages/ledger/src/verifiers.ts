/**
 * Proof verifier implementations
 */

import { readFile } from 'node:fs/promises';
import { groth16 } from 'snarkjs';
import { z } from 'zod';
import { LedgerError, type FieldElement, type Groth16Proof, type ProofVerifier } from '@tessera/types';
import { createLogger, type Logger } from './logger.js';

/**
 * Verifier with a fixed answer. `new StaticVerifier(true)` is the
 * always-accept double for exercising the ledger without circuits.
 */
export class StaticVerifier<P = Groth16Proof> implements ProofVerifier<P> {
  readonly calls: Array<{ proof: P; publicInputs: readonly FieldElement[] }> = [];

  constructor(private readonly result: boolean) {}

  async verify(proof: P, publicInputs: readonly FieldElement[]): Promise<boolean> {
    this.calls.push({ proof, publicInputs: [...publicInputs] });
    return this.result;
  }
}

/** snarkjs verification key, as exported by `snarkjs zkey export verificationkey` */
export const VerificationKeySchema = z
  .object({
    protocol: z.literal('groth16'),
    curve: z.string(),
    nPublic: z.number().int().nonnegative(),
    vk_alpha_1: z.array(z.string()),
    vk_beta_2: z.array(z.array(z.string())),
    vk_gamma_2: z.array(z.array(z.string())),
    vk_delta_2: z.array(z.array(z.string())),
    IC: z.array(z.array(z.string())),
  })
  .passthrough();

export type VerificationKey = z.infer<typeof VerificationKeySchema>;

/**
 * Groth16 verifier backed by snarkjs
 */
export class Groth16Verifier implements ProofVerifier<Groth16Proof> {
  private readonly log: Logger;

  constructor(
    private readonly verificationKey: VerificationKey,
    log?: Logger
  ) {
    this.log = log ?? createLogger('groth16');
  }

  /**
   * Load a verification key JSON file
   */
  static async fromFile(path: string, log?: Logger): Promise<Groth16Verifier> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (err) {
      throw new LedgerError('InvalidConfig', `Cannot read verification key ${path}`, err);
    }

    const parsed = VerificationKeySchema.safeParse(raw);
    if (!parsed.success) {
      throw new LedgerError('InvalidConfig', `Invalid verification key ${path}: ${parsed.error.message}`);
    }
    return new Groth16Verifier(parsed.data, log);
  }

  get publicInputCount(): number {
    return this.verificationKey.nPublic;
  }

  async verify(proof: Groth16Proof, publicInputs: readonly FieldElement[]): Promise<boolean> {
    if (publicInputs.length !== this.verificationKey.nPublic) return false;

    try {
      return await groth16.verify(
        this.verificationKey,
        publicInputs.map((input) => input.toString()),
        toSnarkjsProof(proof)
      );
    } catch (err) {
      this.log.debug({ err }, 'groth16 backend error');
      return false;
    }
  }
}

/**
 * Affine coordinates to the projective decimal-string form snarkjs reads
 */
export function toSnarkjsProof(proof: Groth16Proof) {
  return {
    pi_a: [proof.a[0].toString(), proof.a[1].toString(), '1'],
    pi_b: [
      [proof.b[0][0].toString(), proof.b[0][1].toString()],
      [proof.b[1][0].toString(), proof.b[1][1].toString()],
      ['1', '0'],
    ],
    pi_c: [proof.c[0].toString(), proof.c[1].toString(), '1'],
    protocol: 'groth16',
    curve: 'bn128',
  };
}
