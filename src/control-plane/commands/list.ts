import { Command } from 'commander';
import type { ServiceProvider } from '../context.js';
import { listCommandOptionsSchema } from '../validators.js';
import { print, formatExecutionList, formatJson } from '../formatter.js';
import { parseOptions, reportCommandError } from './shared.js';

/**
 * Create the list command.
 */
export function createListCommand(getServices: ServiceProvider): Command {
  return new Command('list')
    .description('List executions, newest first')
    .option('-l, --limit <n>', 'Maximum number of executions to show', '20')
    .option('--json', 'Output result as JSON', false)
    .action(async (rawOptions: Record<string, unknown>) => {
      try {
        const options = parseOptions(listCommandOptionsSchema, rawOptions);
        if (!options) {
          return;
        }

        const executions = await getServices().engine.listExecutions(options.limit);
        print(options.json ? formatJson(executions) : formatExecutionList(executions));
      } catch (error) {
        reportCommandError(error);
      }
    });
}
