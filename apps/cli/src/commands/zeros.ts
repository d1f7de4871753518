import { Command } from 'commander';
import type { HashName } from '@tessera/types';
import { getHasher } from '@tessera/crypto';
import { buildZeroTable } from '@tessera/merkle';
import { loadConfig, parseDepth, parseHashName } from '../utils/config.js';
import { fail, formatHash, printBanner, printInfo, printTable } from '../utils/display.js';

/**
 * Register the `tessera zeros` command.
 */
export function registerZerosCommand(program: Command): void {
  program
    .command('zeros')
    .description('Print the empty-subtree root for every tree level')
    .option('-d, --depth <n>', 'Tree depth', parseDepth)
    .option('--hash <name>', 'Hash: sha256 or poseidon', parseHashName)
    .action(async (options: { depth?: number; hash?: HashName }) => {
      try {
        const config = loadConfig();
        const depth = options.depth ?? config.treeDepth;
        const hasher = await getHasher(options.hash ?? config.hash);

        printBanner();
        printInfo(`Zero table for depth ${depth} using ${hasher.name}`);
        const zeros = buildZeroTable(hasher, depth);
        printTable(
          ['Level', 'Value'],
          zeros.map((value, level) => [level.toString(), formatHash(value, true)])
        );
      } catch (err) {
        fail(err);
      }
    });
}
