import { Command } from 'commander';
import { registerZerosCommand } from './commands/zeros.js';
import { registerRootCommand } from './commands/root.js';
import { registerNoteCommand } from './commands/note.js';
import { registerSimulateCommand } from './commands/simulate.js';

const program = new Command();

program
  .name('tessera')
  .description('Tessera - confidential note ledger tools')
  .version('0.1.0');

// Register commands
registerZerosCommand(program);
registerRootCommand(program);
registerNoteCommand(program);
registerSimulateCommand(program);

// Parse and execute
await program.parseAsync();
