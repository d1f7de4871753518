/**
 * Scenario files: scripted mints, transfers and redeems replayed against an
 * in-memory ledger with the constraint verifier and in-memory custody.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  createConstraintVerifiers,
  dummyNoteWitness,
  spentNoteWitness,
  type SpentNoteWitness,
  type WitnessProof,
} from '@tessera/circuits';
import {
  addressToField,
  computeNullifierHash,
  createNote,
  encryptNotePayload,
  getHasher,
  isAddress,
  type FieldHasher,
} from '@tessera/crypto';
import {
  CollateralLedger,
  InMemoryCustody,
  NoteLedgerCore,
  NoteLedgerFactory,
  NullifierSet,
  resolveProtocolConfig,
  silentLogger,
  type Logger,
} from '@tessera/ledger';
import { CommitmentTree } from '@tessera/merkle';
import {
  ERROR_CATEGORIES,
  FIXED_TRANSFER_ARITY,
  LedgerError,
  isLedgerError,
  type Address,
  type Hash,
  type LedgerErrorCode,
  type LedgerEventType,
  type LedgerProtocolConfig,
  type LedgerStatus,
  type Note,
} from '@tessera/types';

// ============================================================================
// Schema
// ============================================================================

const Amount = z
  .union([z.string().regex(/^[0-9]+$/, 'must be a non-negative integer'), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

const Label = z.string().min(1);

const ErrorCode = z
  .string()
  .refine((code): code is LedgerErrorCode => code in ERROR_CATEGORIES, { message: 'unknown error code' });

const StepBase = z.object({
  /** Error code the step is expected to fail with */
  expect: ErrorCode.optional(),
  /** Use the root from before the previous step */
  staleRoot: z.boolean().optional(),
});

const MintStep = StepBase.extend({
  op: z.literal('mint'),
  note: Label,
  amount: Amount.optional(),
  from: Label,
});

const TransferStep = StepBase.extend({
  op: z.literal('transfer'),
  inputs: z.array(Label).min(1),
  outputs: z.array(z.object({ note: Label, amount: Amount })).min(1),
});

const RedeemStep = StepBase.extend({
  op: z.literal('redeem'),
  note: Label,
  to: Label,
});

export const ScenarioSchema = z.object({
  asset: z.string().min(1).default('TEST'),
  treeDepth: z.number().int().min(1).max(32).optional(),
  hash: z.enum(['sha256', 'poseidon']).optional(),
  protocol: z
    .object({
      amountMode: z.enum(['public', 'denomination']).optional(),
      denomination: Amount.optional(),
      transferLayout: z.enum(['fixed', 'variable']).optional(),
      maxInputs: z.number().int().min(1).optional(),
      maxOutputs: z.number().int().min(1).optional(),
    })
    .default({}),
  accounts: z.record(
    Label,
    z.object({
      address: z.string().refine(isAddress, { message: 'must be a 0x-prefixed 20-byte hex address' }),
      balance: Amount.default(0),
    })
  ),
  steps: z.array(z.discriminatedUnion('op', [MintStep, TransferStep, RedeemStep])).min(1),
});

export type Scenario = z.infer<typeof ScenarioSchema>;
export type ScenarioStep = Scenario['steps'][number];

/**
 * Read and validate a scenario JSON file
 */
export async function loadScenario(path: string): Promise<Scenario> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new LedgerError('InvalidConfig', `Cannot read scenario ${path}`, err);
  }
  return parseScenario(raw);
}

export function parseScenario(raw: unknown): Scenario {
  const parsed = ScenarioSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new LedgerError('InvalidConfig', `Invalid scenario: ${detail}`);
  }
  return parsed.data;
}

// ============================================================================
// Runner
// ============================================================================

export interface StepOutcome {
  step: number;
  op: ScenarioStep['op'];
  description: string;
  ok: boolean;
  code?: LedgerErrorCode;
  message?: string;
  expected?: LedgerErrorCode;
  /** Outcome matched the step's expectation (success when none was given) */
  asExpected: boolean;
  events: LedgerEventType[];
}

export interface SimulationResult {
  outcomes: StepOutcome[];
  status: LedgerStatus;
  protocol: LedgerProtocolConfig;
  /** Final custody balance per account label */
  balances: Record<string, bigint>;
  pool: bigint;
}

export interface SimulationDefaults {
  treeDepth: number;
  hash: FieldHasher['name'];
  protocol: LedgerProtocolConfig;
  logger?: Logger;
}

const PAYLOAD_SECRET = new TextEncoder().encode('tessera-simulation');

export async function runScenario(scenario: Scenario, defaults: SimulationDefaults): Promise<SimulationResult> {
  const hasher = await getHasher(scenario.hash ?? defaults.hash);
  const protocol = resolveProtocolConfig({ ...defaults.protocol, ...definedOnly(scenario.protocol) });

  const custody = new InMemoryCustody();
  const accounts = new Map<string, Address>();
  for (const [label, account] of Object.entries(scenario.accounts)) {
    accounts.set(label, account.address);
    custody.fund(scenario.asset, account.address, account.balance);
  }

  const issuer = NoteLedgerFactory.issuerFor(scenario.asset);
  const collateral = new CollateralLedger(custody);
  const tree = new CommitmentTree(hasher, scenario.treeDepth ?? defaults.treeDepth);
  const ledger = new NoteLedgerCore<WitnessProof>({
    tree,
    nullifiers: new NullifierSet(),
    collateral,
    verifiers: createConstraintVerifiers(hasher, protocol),
    asset: scenario.asset,
    issuer,
    config: protocol,
    logger: defaults.logger ?? silentLogger,
  });

  const notes = new Map<string, Note>();
  const context: StepContext = { ledger, tree, hasher, protocol, notes, accounts, previousRoot: tree.getRoot() };
  const outcomes: StepOutcome[] = [];

  for (const [i, step] of scenario.steps.entries()) {
    const rootBefore = tree.getRoot();
    const eventsBefore = ledger.getEvents().length;
    let error: unknown;
    try {
      await runStep(step, context);
    } catch (err) {
      error = err;
    }
    context.previousRoot = rootBefore;

    const code = isLedgerError(error) ? error.code : undefined;
    outcomes.push({
      step: i + 1,
      op: step.op,
      description: describeStep(step),
      ok: error === undefined,
      code,
      message: error === undefined ? undefined : error instanceof Error ? error.message : String(error),
      expected: step.expect,
      asExpected: step.expect === undefined ? error === undefined : code === step.expect,
      events: ledger
        .getEvents()
        .slice(eventsBefore)
        .map((event) => event.type),
    });
  }

  const balances: Record<string, bigint> = {};
  for (const [label, address] of accounts) {
    balances[label] = custody.balanceOf(scenario.asset, address);
  }

  return { outcomes, status: ledger.getStatus(), protocol, balances, pool: custody.poolBalance(scenario.asset) };
}

// ============================================================================
// Steps
// ============================================================================

interface StepContext {
  ledger: NoteLedgerCore<WitnessProof>;
  tree: CommitmentTree;
  hasher: FieldHasher;
  protocol: LedgerProtocolConfig;
  notes: Map<string, Note>;
  accounts: Map<string, Address>;
  previousRoot: Hash;
}

async function runStep(step: ScenarioStep, ctx: StepContext): Promise<void> {
  const root = step.staleRoot ? ctx.previousRoot : ctx.tree.getRoot();

  switch (step.op) {
    case 'mint': {
      const denominated = ctx.protocol.amountMode === 'denomination';
      const amount = denominated ? ctx.protocol.denomination : (step.amount ?? 0n);
      const note = createNote(amount, ctx.hasher);
      ctx.notes.set(step.note, note);
      await ctx.ledger.mint({
        commitment: note.commitment,
        nullifierHash: denominated ? undefined : note.nullifierHash,
        amount: denominated ? step.amount : amount,
        depositor: account(ctx, step.from),
        encryptedPayload: encryptNotePayload(note, PAYLOAD_SECRET),
        proof: { kind: 'mint', note },
      });
      return;
    }

    case 'transfer': {
      const inputs: SpentNoteWitness[] = step.inputs.map((label) => spentNoteWitness(noteFor(ctx, label), ctx.tree));
      const outputs = step.outputs.map((output) => {
        const note = createNote(output.amount, ctx.hasher);
        ctx.notes.set(output.note, note);
        return note;
      });

      if (ctx.protocol.transferLayout === 'fixed') {
        while (inputs.length < FIXED_TRANSFER_ARITY.inputs) inputs.push(dummyNoteWitness(ctx.tree.getDepth()));
        while (outputs.length < FIXED_TRANSFER_ARITY.outputs) outputs.push(createNote(0n, ctx.hasher));
      }

      await ctx.ledger.transfer({
        inputNullifiers: inputs.map((input) => computeNullifierHash(ctx.hasher, input.nullifierSeed)),
        outputCommitments: outputs.map((note) => note.commitment),
        merkleRoot: root,
        encryptedPayloads: outputs.map((note) => encryptNotePayload(note, PAYLOAD_SECRET)),
        proof: { kind: 'transfer', inputs, outputs },
      });
      return;
    }

    case 'redeem': {
      const note = noteFor(ctx, step.note);
      const recipient = account(ctx, step.to);
      const publicMode = ctx.protocol.amountMode === 'public';
      await ctx.ledger.redeem({
        nullifier: note.nullifierHash,
        recipient,
        merkleRoot: root,
        amount: publicMode ? note.amount : undefined,
        commitment: publicMode ? note.commitment : undefined,
        proof: { kind: 'redeem', note: spentNoteWitness(note, ctx.tree), recipient: addressToField(recipient) },
      });
      return;
    }
  }
}

function describeStep(step: ScenarioStep): string {
  switch (step.op) {
    case 'mint':
      return `${step.from} mints ${step.note}${step.amount === undefined ? '' : ` (${step.amount})`}`;
    case 'transfer':
      return `${step.inputs.join(' + ')} -> ${step.outputs.map((o) => `${o.note} (${o.amount})`).join(' + ')}`;
    case 'redeem':
      return `${step.note} redeemed to ${step.to}`;
  }
}

function noteFor(ctx: StepContext, label: string): Note {
  const note = ctx.notes.get(label);
  if (!note) {
    throw new Error(`Unknown note "${label}"`);
  }
  return note;
}

function account(ctx: StepContext, label: string): Address {
  const address = ctx.accounts.get(label);
  if (!address) {
    throw new Error(`Unknown account "${label}"`);
  }
  return address;
}

function definedOnly<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}
