import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { createLogger } from '@tessera/ledger';
import { loadConfig } from '../utils/config.js';
import { colors, fail, formatHash, printBanner, printError, printInfo, printSuccess, printTable } from '../utils/display.js';
import { loadScenario, runScenario, type SimulationResult } from '../utils/scenario.js';

/**
 * Register the `tessera simulate` command.
 *
 * Replays a scenario file against an in-memory ledger, checking every proof
 * with the constraint verifier.
 */
export function registerSimulateCommand(program: Command): void {
  program
    .command('simulate <scenario>')
    .description('Replay a scenario of mints, transfers and redeems against an in-memory ledger')
    .option('-v, --verbose', 'Print ledger logs')
    .action(async (scenarioPath: string, options: { verbose?: boolean }) => {
      try {
        const config = loadConfig();
        const scenario = await loadScenario(scenarioPath);

        printBanner();
        const spinner = ora({ text: `Running ${scenario.steps.length} steps...`, color: 'cyan' }).start();
        let result: SimulationResult;
        try {
          result = await runScenario(scenario, {
            treeDepth: config.treeDepth,
            hash: config.hash,
            protocol: config.protocol,
            logger: createLogger('simulate', options.verbose ? config.logLevel : 'silent'),
          });
          spinner.stop();
        } catch (err) {
          spinner.fail('Simulation failed');
          throw err;
        }

        printInfo(
          `Asset ${chalk.white(result.status.asset)}, ${result.protocol.amountMode} amounts, ${result.protocol.transferLayout} transfers`
        );
        console.log('');

        printTable(
          ['#', 'Step', 'Result', 'Events'],
          result.outcomes.map((outcome) => [
            outcome.step.toString(),
            outcome.description,
            outcome.ok
              ? colors.success('ok')
              : (outcome.asExpected ? colors.warning : colors.error)(outcome.code ?? outcome.message ?? 'failed'),
            outcome.events.join(', '),
          ])
        );
        console.log('');

        printTable(
          ['State', 'Value'],
          [
            ['Root', formatHash(result.status.root)],
            ['Notes', `${result.status.nextIndex} / ${result.status.capacity}`],
            ['Spent nullifiers', result.status.spentNullifiers.toString()],
            ['Collateral locked', result.status.totalLocked.toString()],
            ['Custody pool', result.pool.toString()],
            ...Object.entries(result.balances).map(([label, balance]) => [`Balance ${label}`, balance.toString()]),
          ]
        );
        console.log('');

        const unexpected = result.outcomes.filter((outcome) => !outcome.asExpected);
        if (unexpected.length > 0) {
          printError(`${unexpected.length} step(s) did not go as expected: ${unexpected.map((o) => o.step).join(', ')}`);
          process.exitCode = 1;
        } else {
          printSuccess('All steps went as expected');
        }
      } catch (err) {
        fail(err);
      }
    });
}
