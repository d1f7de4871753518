/**
 * Public-input vectors per transition and protocol variant
 *
 * These orderings are the contract with the circuits. A vector in the wrong
 * order does not error; the proof just fails to verify.
 */

import type {
  Commitment,
  FieldElement,
  Hash,
  LedgerProtocolConfig,
  NullifierHash,
} from '@tessera/types';

export interface MintInputs {
  commitment: Commitment;
  nullifierHash?: NullifierHash;
}

export interface TransferInputs {
  merkleRoot: Hash;
  inputNullifiers: readonly NullifierHash[];
  outputCommitments: readonly Commitment[];
}

export interface RedeemInputs {
  merkleRoot: Hash;
  nullifier: NullifierHash;
  recipient: FieldElement;
  amount?: bigint;
  commitment?: Commitment;
}

type Layout = Pick<LedgerProtocolConfig, 'amountMode' | 'denomination' | 'transferLayout'>;

/**
 * public:       [commitment, nullifierHash]
 * denomination: [commitment, denomination]
 */
export function mintPublicInputs(config: Layout, inputs: MintInputs): FieldElement[] {
  if (config.amountMode === 'denomination') {
    return [inputs.commitment, config.denomination];
  }
  return [inputs.commitment, inputs.nullifierHash ?? 0n];
}

/**
 * fixed:    [root, n0, n1, c0, c1]
 * variable: [n..., c..., root]
 */
export function transferPublicInputs(config: Layout, inputs: TransferInputs): FieldElement[] {
  if (config.transferLayout === 'fixed') {
    return [inputs.merkleRoot, ...inputs.inputNullifiers, ...inputs.outputCommitments];
  }
  return [...inputs.inputNullifiers, ...inputs.outputCommitments, inputs.merkleRoot];
}

/**
 * denomination: [nullifier, recipient, root]
 * public:       [root, amount, recipient, commitment, nullifier]
 */
export function redeemPublicInputs(config: Layout, inputs: RedeemInputs): FieldElement[] {
  if (config.amountMode === 'denomination') {
    return [inputs.nullifier, inputs.recipient, inputs.merkleRoot];
  }
  return [inputs.merkleRoot, inputs.amount ?? 0n, inputs.recipient, inputs.commitment ?? 0n, inputs.nullifier];
}

/**
 * Amount a mint locks. In denomination mode it is read back from slot 1 and so
 * bound by the proof. The public-mode layout carries no amount, so the
 * requested amount is trusted as given and a note may commit to more than
 * was locked.
 */
export function mintedAmount(config: Layout, publicInputs: readonly FieldElement[], requested?: bigint): bigint {
  return config.amountMode === 'denomination' ? publicInputs[1] : requested ?? 0n;
}
