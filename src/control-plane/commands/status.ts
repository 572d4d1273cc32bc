import { Command } from 'commander';
import type { ServiceProvider } from '../context.js';
import { jsonOptionsSchema } from '../validators.js';
import { print, formatExecutionDetail, formatJson } from '../formatter.js';
import { parseOptions, reportCommandError } from './shared.js';

/**
 * Create the status command.
 */
export function createStatusCommand(getServices: ServiceProvider): Command {
  return new Command('status')
    .description('Show an execution and its tasks')
    .argument('<executionId>', 'Execution ID')
    .option('--json', 'Output result as JSON', false)
    .action(async (executionId: string, rawOptions: Record<string, unknown>) => {
      try {
        const options = parseOptions(jsonOptionsSchema, rawOptions);
        if (!options) {
          return;
        }

        const execution = await getServices().engine.getExecution(executionId);
        print(options.json ? formatJson(execution) : formatExecutionDetail(execution));
      } catch (error) {
        reportCommandError(error);
      }
    });
}
