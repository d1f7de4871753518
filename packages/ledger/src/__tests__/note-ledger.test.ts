import { describe, it, expect } from 'vitest';
import { sha256Hasher } from '@tessera/crypto';
import { CommitmentTree } from '@tessera/merkle';
import {
  isLedgerError,
  type Address,
  type AssetId,
  type FieldElement,
  type LedgerErrorCode,
  type LedgerEvent,
  type LedgerProtocolConfig,
  type MintRequest,
  type ProofVerifier,
  type RedeemRequest,
  type TransferRequest,
} from '@tessera/types';
import { CollateralLedger, type IssuerHandle } from '../collateral-ledger.js';
import { InMemoryCustody } from '../custody.js';
import { silentLogger } from '../logger.js';
import { NoteLedgerCore } from '../note-ledger.js';
import { NullifierSet } from '../nullifier-set.js';
import { StaticVerifier } from '../verifiers.js';

type Proof = { id: string };

const ASSET = 'TEST';
const ISSUER = 'ledger:TEST';
const E18 = 1_000_000_000_000_000_000n;
const ALICE: Address = `0x${'a1'.repeat(20)}`;
const BOB: Address = `0x${'b2'.repeat(20)}`;
const PAYLOAD = new Uint8Array([1, 2, 3]);

class FlakyCustody extends InMemoryCustody {
  failOut = false;

  async transferOut(asset: AssetId, to: Address, amount: bigint): Promise<void> {
    if (this.failOut) throw new Error('custody offline');
    return super.transferOut(asset, to, amount);
  }
}

interface SetupOptions {
  depth?: number;
  config?: Partial<LedgerProtocolConfig>;
  verifier?: ProofVerifier<Proof>;
}

function setup(options: SetupOptions = {}) {
  const custody = new FlakyCustody();
  custody.fund(ASSET, ALICE, 10n * E18);
  const collateral = new CollateralLedger(custody);
  const tree = new CommitmentTree(sha256Hasher, options.depth ?? 8);
  const nullifiers = new NullifierSet();
  const verifier = options.verifier ?? new StaticVerifier<Proof>(true);
  const ledger = new NoteLedgerCore<Proof>({
    tree,
    nullifiers,
    collateral,
    verifiers: { mint: verifier, transfer: verifier, redeem: verifier },
    asset: ASSET,
    issuer: ISSUER,
    config: options.config,
    logger: silentLogger,
  });
  return { custody, collateral, tree, nullifiers, ledger };
}

function mintRequest(commitment: bigint, overrides: Partial<MintRequest<Proof>> = {}): MintRequest<Proof> {
  return {
    commitment,
    nullifierHash: commitment + 1_000_000n,
    amount: E18,
    depositor: ALICE,
    encryptedPayload: PAYLOAD,
    proof: { id: `mint-${commitment}` },
    ...overrides,
  };
}

function transferRequest(
  merkleRoot: bigint,
  inputNullifiers: bigint[],
  outputCommitments: bigint[]
): TransferRequest<Proof> {
  return {
    inputNullifiers,
    outputCommitments,
    merkleRoot,
    encryptedPayloads: outputCommitments.map(() => PAYLOAD),
    proof: { id: 'transfer' },
  };
}

function redeemRequest(merkleRoot: bigint, nullifier: bigint, overrides: Partial<RedeemRequest<Proof>> = {}): RedeemRequest<Proof> {
  return {
    nullifier,
    recipient: BOB,
    merkleRoot,
    amount: E18,
    commitment: 11n,
    proof: { id: 'redeem' },
    ...overrides,
  };
}

async function expectCode(promise: Promise<unknown>, code: LedgerErrorCode): Promise<void> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  expect(isLedgerError(err) ? err.code : err).toBe(code);
}

describe('NoteLedgerCore', () => {
  describe('mint', () => {
    it('locks collateral and commits the note', async () => {
      const { ledger, custody } = setup();
      const result = await ledger.mint(mintRequest(11n));

      expect(result).toEqual({ index: 0, root: ledger.getMerkleRoot(), amount: E18 });
      expect(ledger.commitmentExists(11n)).toBe(true);
      expect(ledger.getNextIndex()).toBe(1);
      expect(ledger.getTotalLocked()).toBe(E18);
      expect(custody.balanceOf(ASSET, ALICE)).toBe(9n * E18);
      expect(ledger.getEvents()).toEqual([
        { type: 'NoteCommitted', sequence: 0, commitment: 11n, index: 0, encryptedPayload: PAYLOAD },
        { type: 'Deposit', sequence: 1, commitment: 11n },
        { type: 'CollateralLocked', sequence: 2, commitment: 11n },
      ]);
    });

    it('verifies [commitment, nullifierHash] in public mode', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger } = setup({ verifier });
      await ledger.mint(mintRequest(11n, { nullifierHash: 99n }));
      expect(verifier.calls[0].publicInputs).toEqual([11n, 99n]);
    });

    it('takes the denomination in denomination mode', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger } = setup({ verifier, config: { amountMode: 'denomination', denomination: 5n } });

      const result = await ledger.mint(mintRequest(11n, { amount: undefined, nullifierHash: undefined }));
      expect(result.amount).toBe(5n);
      expect(verifier.calls[0].publicInputs).toEqual([11n, 5n]);
      expect(ledger.getTotalLocked()).toBe(5n);

      await expectCode(ledger.mint(mintRequest(12n, { amount: 6n })), 'InvalidAmount');
    });

    it('rejects a commitment that already exists', async () => {
      const { ledger } = setup();
      await ledger.mint(mintRequest(11n));
      await expectCode(ledger.mint(mintRequest(11n, { nullifierHash: 5n })), 'CommitmentAlreadyExists');
      expect(ledger.getTotalLocked()).toBe(E18);
      expect(ledger.getNextIndex()).toBe(1);
    });

    it('rejects malformed requests before verifying', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger } = setup({ verifier });

      await expectCode(ledger.mint(mintRequest(0n)), 'InvalidCommitment');
      await expectCode(ledger.mint(mintRequest(11n, { amount: 0n })), 'InvalidAmount');
      await expectCode(ledger.mint(mintRequest(11n, { amount: undefined })), 'InvalidAmount');
      await expectCode(ledger.mint(mintRequest(11n, { nullifierHash: undefined })), 'InvalidNullifier');
      expect(verifier.calls).toHaveLength(0);
    });

    it('rejects a deposit nullifier that is already spent', async () => {
      const { ledger } = setup();
      await ledger.mint(mintRequest(11n));
      await ledger.transfer(transferRequest(ledger.getMerkleRoot(), [77n, 78n], [21n, 22n]));

      await expectCode(ledger.mint(mintRequest(12n, { nullifierHash: 77n })), 'NullifierAlreadySpent');
    });

    it('leaves no trace when the proof fails', async () => {
      const { ledger, custody } = setup({ verifier: new StaticVerifier<Proof>(false) });
      const root = ledger.getMerkleRoot();

      await expectCode(ledger.mint(mintRequest(11n)), 'InvalidProof');
      expect(ledger.getMerkleRoot()).toBe(root);
      expect(ledger.commitmentExists(11n)).toBe(false);
      expect(ledger.getTotalLocked()).toBe(0n);
      expect(custody.balanceOf(ASSET, ALICE)).toBe(10n * E18);
      expect(ledger.getEvents()).toEqual([]);
    });

    it('treats a throwing verifier as an invalid proof', async () => {
      const verifier: ProofVerifier<Proof> = {
        verify: async () => {
          throw new Error('backend down');
        },
      };
      const { ledger } = setup({ verifier });
      await expectCode(ledger.mint(mintRequest(11n)), 'InvalidProof');
    });

    it('leaves no trace when the depositor cannot pay', async () => {
      const { ledger } = setup();
      await expectCode(ledger.mint(mintRequest(11n, { amount: 11n * E18 })), 'TransferFailed');
      expect(ledger.commitmentExists(11n)).toBe(false);
      expect(ledger.getEvents()).toEqual([]);
    });

    it('fails with TreeFull once 2^depth notes exist', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger } = setup({ depth: 2, verifier });
      for (let c = 1n; c <= 4n; c++) {
        await ledger.mint(mintRequest(c, { amount: 1n }));
      }

      await expectCode(ledger.mint(mintRequest(5n, { amount: 1n })), 'TreeFull');
      expect(verifier.calls).toHaveLength(4);
      expect(ledger.getNextIndex()).toBe(4);
      expect(ledger.getTotalLocked()).toBe(4n);
    });
  });

  describe('transfer', () => {
    it('spends inputs and commits outputs against the current root', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger, tree } = setup({ verifier });
      await ledger.mint(mintRequest(11n));
      const root = ledger.getMerkleRoot();

      const result = await ledger.transfer(transferRequest(root, [101n, 102n], [21n, 22n]));

      expect(result.indices).toEqual([1, 2]);
      expect(result.root).toBe(tree.getRoot());
      expect(verifier.calls[1].publicInputs).toEqual([root, 101n, 102n, 21n, 22n]);
      expect(ledger.isNullifierSpent(101n)).toBe(true);
      expect(ledger.commitmentExists(22n)).toBe(true);
      expect(ledger.getTotalLocked()).toBe(E18);
      expect(ledger.getEvents().slice(3).map((e) => e.type)).toEqual([
        'NullifierSpent',
        'NullifierSpent',
        'NoteCommitted',
        'NoteCommitted',
      ]);
    });

    it('rejects a replayed transfer', async () => {
      const { ledger } = setup();
      await ledger.mint(mintRequest(11n));
      const request = transferRequest(ledger.getMerkleRoot(), [101n, 102n], [21n, 22n]);
      await ledger.transfer(request);

      await expectCode(ledger.transfer(request), 'NullifierAlreadySpent');
      await expectCode(
        ledger.transfer(transferRequest(ledger.getMerkleRoot(), [101n, 103n], [31n, 32n])),
        'NullifierAlreadySpent'
      );
    });

    it('rejects duplicates inside one request', async () => {
      const { ledger } = setup();
      const root = ledger.getMerkleRoot();
      await expectCode(ledger.transfer(transferRequest(root, [101n, 101n], [21n, 22n])), 'NullifierAlreadySpent');
      await expectCode(ledger.transfer(transferRequest(root, [101n, 102n], [21n, 21n])), 'CommitmentAlreadyExists');
      expect(ledger.getEvents()).toEqual([]);
    });

    it('enforces the fixed 2x2 arity and payload count', async () => {
      const { ledger } = setup();
      const root = ledger.getMerkleRoot();
      await expectCode(ledger.transfer(transferRequest(root, [101n], [21n, 22n])), 'InvalidArrayLength');
      await expectCode(ledger.transfer(transferRequest(root, [101n, 102n], [21n, 22n, 23n])), 'InvalidArrayLength');
      await expectCode(
        ledger.transfer({ ...transferRequest(root, [101n, 102n], [21n, 22n]), encryptedPayloads: [PAYLOAD] }),
        'InvalidArrayLength'
      );
    });

    it('takes k-in/m-out in the variable layout', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger } = setup({ verifier, config: { transferLayout: 'variable', maxInputs: 3, maxOutputs: 3 } });
      const root = ledger.getMerkleRoot();

      const result = await ledger.transfer(transferRequest(root, [101n], [21n, 22n, 23n]));
      expect(result.indices).toEqual([0, 1, 2]);
      expect(verifier.calls[0].publicInputs).toEqual([101n, 21n, 22n, 23n, root]);

      await expectCode(
        ledger.transfer(transferRequest(ledger.getMerkleRoot(), [201n, 202n, 203n, 204n], [31n])),
        'InvalidArrayLength'
      );
      await expectCode(ledger.transfer(transferRequest(ledger.getMerkleRoot(), [], [31n])), 'InvalidArrayLength');
    });

    it('rejects a stale root', async () => {
      const { ledger } = setup();
      const stale = ledger.getMerkleRoot();
      await ledger.mint(mintRequest(11n));
      await expectCode(ledger.transfer(transferRequest(stale, [101n, 102n], [21n, 22n])), 'InvalidMerkleRoot');
    });

    it('rejects outputs that do not fit before verifying', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger } = setup({ depth: 2, verifier });
      for (let c = 1n; c <= 3n; c++) {
        await ledger.mint(mintRequest(c, { amount: 1n }));
      }
      await expectCode(ledger.transfer(transferRequest(ledger.getMerkleRoot(), [101n, 102n], [21n, 22n])), 'TreeFull');
      expect(ledger.isNullifierSpent(101n)).toBe(false);
      expect(verifier.calls).toHaveLength(3);
    });

    it('leaves no trace when the proof fails', async () => {
      const { ledger } = setup({ verifier: new StaticVerifier<Proof>(false) });
      const root = ledger.getMerkleRoot();
      await expectCode(ledger.transfer(transferRequest(root, [101n, 102n], [21n, 22n])), 'InvalidProof');
      expect(ledger.isNullifierSpent(101n)).toBe(false);
      expect(ledger.commitmentExists(21n)).toBe(false);
      expect(ledger.getMerkleRoot()).toBe(root);
    });
  });

  describe('redeem', () => {
    it('releases collateral and spends the nullifier', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger, custody } = setup({ verifier });
      await ledger.mint(mintRequest(11n));
      const root = ledger.getMerkleRoot();

      const result = await ledger.redeem(redeemRequest(root, 301n));

      expect(result).toEqual({ amount: E18, root });
      expect(verifier.calls[1].publicInputs).toEqual([root, E18, BigInt(BOB), 11n, 301n]);
      expect(ledger.isNullifierSpent(301n)).toBe(true);
      expect(ledger.getTotalLocked()).toBe(0n);
      expect(custody.balanceOf(ASSET, BOB)).toBe(E18);
      expect(ledger.getEvents().slice(3)).toEqual([
        { type: 'NullifierSpent', sequence: 3, nullifier: 301n },
        { type: 'Withdrawal', sequence: 4, nullifier: 301n },
        { type: 'CollateralReleased', sequence: 5, nullifier: 301n },
      ]);
    });

    it('keeps collateral out of reach of callers that only know the issuer id', async () => {
      const { ledger, collateral, custody } = setup();
      await ledger.mint(mintRequest(11n));
      const lookalike: IssuerHandle = { asset: ASSET, issuer: ledger.issuer };

      await expectCode(collateral.release(ASSET, lookalike, E18, BOB), 'UnauthorizedIssuer');
      await expectCode(
        Promise.resolve().then(() => collateral.registerIssuer(ASSET, ledger.issuer)),
        'UnauthorizedIssuer'
      );
      expect(ledger.getTotalLocked()).toBe(E18);
      expect(custody.balanceOf(ASSET, BOB)).toBe(0n);
      expect(custody.poolBalance(ASSET)).toBe(E18);
    });

    it('uses [nullifier, recipient, root] in denomination mode', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger } = setup({ verifier, config: { amountMode: 'denomination', denomination: E18 } });
      await ledger.mint(mintRequest(11n, { amount: undefined }));
      const root = ledger.getMerkleRoot();

      const result = await ledger.redeem(redeemRequest(root, 301n, { amount: undefined, commitment: undefined }));
      expect(result.amount).toBe(E18);
      expect(verifier.calls[1].publicInputs).toEqual([301n, BigInt(BOB), root]);
    });

    it('rejects double spends', async () => {
      const { ledger } = setup();
      await ledger.mint(mintRequest(11n));
      await ledger.mint(mintRequest(12n));
      await ledger.redeem(redeemRequest(ledger.getMerkleRoot(), 301n));

      await expectCode(ledger.redeem(redeemRequest(ledger.getMerkleRoot(), 301n)), 'NullifierAlreadySpent');
      expect(ledger.getTotalLocked()).toBe(E18);
    });

    it('rejects malformed requests', async () => {
      const { ledger } = setup();
      await ledger.mint(mintRequest(11n));
      const root = ledger.getMerkleRoot();

      await expectCode(ledger.redeem(redeemRequest(root, 301n, { recipient: '0x1234' })), 'InvalidRecipient');
      await expectCode(ledger.redeem(redeemRequest(root, -1n)), 'InvalidNullifier');
      await expectCode(ledger.redeem(redeemRequest(root, 301n, { amount: 0n })), 'InvalidAmount');
      await expectCode(ledger.redeem(redeemRequest(root, 301n, { commitment: undefined })), 'InvalidCommitment');
      await expectCode(ledger.redeem(redeemRequest(root, 301n, { commitment: 999n })), 'InvalidCommitment');
    });

    it('never releases more than is locked', async () => {
      const verifier = new StaticVerifier<Proof>(true);
      const { ledger } = setup({ verifier });
      await ledger.mint(mintRequest(11n));

      await expectCode(ledger.redeem(redeemRequest(ledger.getMerkleRoot(), 301n, { amount: 2n * E18 })), 'InsufficientCollateral');
      expect(verifier.calls).toHaveLength(1);
      expect(ledger.isNullifierSpent(301n)).toBe(false);
    });

    it('rolls back completely when custody cannot pay out', async () => {
      const { ledger, custody } = setup();
      await ledger.mint(mintRequest(11n));
      const eventCount = ledger.getEvents().length;
      custody.failOut = true;

      await expectCode(ledger.redeem(redeemRequest(ledger.getMerkleRoot(), 301n)), 'TransferFailed');
      expect(ledger.isNullifierSpent(301n)).toBe(false);
      expect(ledger.getTotalLocked()).toBe(E18);
      expect(ledger.getEvents()).toHaveLength(eventCount);

      custody.failOut = false;
      await expect(ledger.redeem(redeemRequest(ledger.getMerkleRoot(), 301n))).resolves.toEqual({
        amount: E18,
        root: ledger.getMerkleRoot(),
      });
    });
  });

  describe('concurrency', () => {
    it('serialises writes and never runs two verifications at once', async () => {
      let active = 0;
      let maxActive = 0;
      const delays = [30, 20, 10, 0];
      let call = 0;
      const verifier: ProofVerifier<Proof> = {
        verify: async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((resolve) => setTimeout(resolve, delays[call++ % delays.length]));
          active--;
          return true;
        },
      };
      const { ledger } = setup({ verifier });

      const results = await Promise.all([1n, 2n, 3n, 4n].map((c) => ledger.mint(mintRequest(c))));

      expect(results.map((r) => r.index)).toEqual([0, 1, 2, 3]);
      expect(maxActive).toBe(1);
      expect(ledger.getTotalLocked()).toBe(4n * E18);
    });

    it('lets exactly one of two racing spends of a nullifier through', async () => {
      const { ledger } = setup();
      await ledger.mint(mintRequest(11n));
      await ledger.mint(mintRequest(12n));
      const root = ledger.getMerkleRoot();

      const results = await Promise.allSettled([
        ledger.redeem(redeemRequest(root, 301n)),
        ledger.redeem(redeemRequest(root, 301n, { commitment: 12n })),
      ]);

      expect(results[0].status).toBe('fulfilled');
      expect(results[1].status).toBe('rejected');
      expect(ledger.getTotalLocked()).toBe(E18);
    });

    it('rejects a spend whose root was overtaken by a queued mint', async () => {
      const { ledger } = setup();
      await ledger.mint(mintRequest(11n));
      const captured = ledger.getMerkleRoot();

      const [mint, redeem] = await Promise.allSettled([
        ledger.mint(mintRequest(12n)),
        ledger.redeem(redeemRequest(captured, 301n)),
      ]);

      expect(mint.status).toBe('fulfilled');
      expect(redeem.status === 'rejected' && isLedgerError(redeem.reason, 'InvalidMerkleRoot')).toBe(true);
    });

    it('keeps queries consistent with the last committed operation', async () => {
      const { ledger } = setup();
      const snapshots: Array<{ root: FieldElement; next: number }> = [];
      ledger.onEvent(() => {
        snapshots.push({ root: ledger.getMerkleRoot(), next: ledger.getNextIndex() });
      });

      await ledger.mint(mintRequest(11n));
      // every event of the mint observed the post-insert state
      expect(snapshots).toEqual(Array(3).fill({ root: ledger.getMerkleRoot(), next: 1 }));
    });
  });

  describe('events and status', () => {
    it('logs its own copy of each encrypted payload', async () => {
      const { ledger } = setup();
      const mintPayload = new Uint8Array([7, 7, 7]);
      await ledger.mint(mintRequest(11n, { encryptedPayload: mintPayload }));
      const outputPayloads = [new Uint8Array([8]), new Uint8Array([9])];
      await ledger.transfer({ ...transferRequest(ledger.getMerkleRoot(), [101n, 102n], [21n, 22n]), encryptedPayloads: outputPayloads });

      mintPayload.fill(0);
      outputPayloads[0][0] = 0;

      const payloads = ledger
        .getEvents()
        .flatMap((event) => (event.type === 'NoteCommitted' ? [Array.from(event.encryptedPayload)] : []));
      expect(payloads).toEqual([[7, 7, 7], [8], [9]]);
    });

    it('isolates failing handlers and supports unsubscribe', async () => {
      const { ledger } = setup();
      const seen: LedgerEvent[] = [];
      ledger.onEvent(() => {
        throw new Error('handler bug');
      });
      const unsubscribe = ledger.onEvent((event) => seen.push(event));

      await ledger.mint(mintRequest(11n));
      expect(seen.map((e) => e.type)).toEqual(['NoteCommitted', 'Deposit', 'CollateralLocked']);

      unsubscribe();
      await ledger.mint(mintRequest(12n));
      expect(seen).toHaveLength(3);
      expect(ledger.getEvents()).toHaveLength(6);
    });

    it('reports status and paths', async () => {
      const { ledger } = setup({ depth: 4 });
      await ledger.mint(mintRequest(11n));
      await ledger.transfer(transferRequest(ledger.getMerkleRoot(), [101n, 102n], [21n, 22n]));

      expect(ledger.getStatus()).toEqual({
        asset: ASSET,
        issuer: ISSUER,
        root: ledger.getMerkleRoot(),
        nextIndex: 3,
        capacity: 16,
        spentNullifiers: 2,
        totalLocked: E18,
        eventCount: 7,
      });

      const path = ledger.getMerklePath(2);
      expect(path.leaf).toBe(22n);
      expect(CommitmentTree.verifyProof(sha256Hasher, ledger.getMerkleRoot(), 22n, 2, path.siblings)).toBe(true);
    });

    it('rejects an invalid protocol config', () => {
      expect(() => setup({ config: { maxOutputs: 0 } })).toThrow('Invalid ledger config');
    });
  });
});
