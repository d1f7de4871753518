import chalk from 'chalk';
import Table from 'cli-table3';
import { toHex32 } from '@tessera/crypto';

const BRAND = {
  primary: chalk.hex('#0ea5e9'),
  secondary: chalk.hex('#7dd3fc'),
  success: chalk.hex('#10b981'),
  warning: chalk.hex('#f59e0b'),
  error: chalk.hex('#ef4444'),
  muted: chalk.gray,
};

/**
 * Print the Tessera banner/header.
 */
export function printBanner(): void {
  console.log('');
  console.log(BRAND.primary('  ╔══════════════════════════════════════╗'));
  console.log(BRAND.primary('  ║') + BRAND.secondary('     TESSERA - Confidential Notes     ') + BRAND.primary('║'));
  console.log(BRAND.primary('  ╚══════════════════════════════════════╝'));
  console.log('');
}

/**
 * Shorten a 32-byte hash for tables: 0x1234abcd…9f8e
 */
export function formatHash(value: bigint, full = false): string {
  const hex = toHex32(value);
  return full ? hex : `${hex.slice(0, 10)}…${hex.slice(-4)}`;
}

export function printInfo(message: string): void {
  console.log(BRAND.secondary('  i ') + message);
}

export function printSuccess(message: string): void {
  console.log(BRAND.success('  + ') + message);
}

export function printWarning(message: string): void {
  console.log(BRAND.warning('  ! ') + message);
}

export function printError(message: string): void {
  console.log(BRAND.error('  x ') + message);
}

/**
 * Print a formatted table with headers and rows.
 */
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.bold(h)),
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const row of rows) {
    table.push(row);
  }

  console.log(table.toString());
}

/** Print an error and exit non-zero */
export function fail(err: unknown): never {
  printError(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

export const colors = BRAND;
