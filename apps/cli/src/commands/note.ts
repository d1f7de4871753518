import { Command } from 'commander';
import type { HashName } from '@tessera/types';
import { createNote, getHasher, parseBigInt } from '@tessera/crypto';
import { loadConfig, parseHashName } from '../utils/config.js';
import { fail, formatHash, printBanner, printTable, printWarning } from '../utils/display.js';

/**
 * Register the `tessera note` command.
 */
export function registerNoteCommand(program: Command): void {
  program
    .command('note <amount>')
    .description('Generate a note and print its commitment and nullifier hash')
    .option('--hash <name>', 'Hash: sha256 or poseidon', parseHashName)
    .action(async (amountText: string, options: { hash?: HashName }) => {
      try {
        const config = loadConfig();
        const hasher = await getHasher(options.hash ?? config.hash);
        const note = createNote(parseBigInt(amountText), hasher);

        printBanner();
        printTable(
          ['Field', 'Value'],
          [
            ['Amount', note.amount.toString()],
            ['Secret', formatHash(note.secret, true)],
            ['Nullifier seed', formatHash(note.nullifierSeed, true)],
            ['Commitment', formatHash(note.commitment, true)],
            ['Nullifier hash', formatHash(note.nullifierHash, true)],
          ]
        );
        console.log('');
        printWarning('Secret and nullifier seed are the only way to spend this note. Store them privately.');
      } catch (err) {
        fail(err);
      }
    });
}
