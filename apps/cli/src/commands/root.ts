import { Command } from 'commander';
import type { HashName } from '@tessera/types';
import ora from 'ora';
import { getHasher } from '@tessera/crypto';
import { CommitmentTree } from '@tessera/merkle';
import { loadConfig, parseDepth, parseHashName } from '../utils/config.js';
import { fail, formatHash, printBanner, printTable } from '../utils/display.js';
import { loadLeaves } from '../utils/leaves.js';

/**
 * Register the `tessera root` command.
 */
export function registerRootCommand(program: Command): void {
  program
    .command('root <leaves>')
    .description('Compute the commitment tree root of a JSON array of leaves')
    .option('-d, --depth <n>', 'Tree depth', parseDepth)
    .option('--hash <name>', 'Hash: sha256 or poseidon', parseHashName)
    .action(async (leavesPath: string, options: { depth?: number; hash?: HashName }) => {
      try {
        const config = loadConfig();
        const hasher = await getHasher(options.hash ?? config.hash);
        const leaves = await loadLeaves(leavesPath);

        printBanner();
        const spinner = ora({ text: `Inserting ${leaves.length} leaves...`, color: 'cyan' }).start();
        const tree = new CommitmentTree(hasher, options.depth ?? config.treeDepth);
        try {
          tree.insertMany(leaves);
          spinner.succeed(`Inserted ${leaves.length} leaves`);
        } catch (err) {
          spinner.fail('Insert failed');
          throw err;
        }

        printTable(
          ['Field', 'Value'],
          [
            ['Hash', tree.getHashName()],
            ['Depth', tree.getDepth().toString()],
            ['Root', formatHash(tree.getRoot(), true)],
            ['Root (decimal)', tree.getRoot().toString()],
            ['Next index', tree.getNextIndex().toString()],
            ['Remaining', tree.getRemainingCapacity().toString()],
          ]
        );
      } catch (err) {
        fail(err);
      }
    });
}
