import { Command } from 'commander';
import type { ServiceProvider } from '../context.js';
import { cancelCommandOptionsSchema } from '../validators.js';
import { print, formatJson, formatSuccess } from '../formatter.js';
import { parseOptions, reportCommandError } from './shared.js';

/**
 * Create the cancel command.
 */
export function createCancelCommand(getServices: ServiceProvider): Command {
  return new Command('cancel')
    .description('Cancel an execution that has not finished')
    .argument('<executionId>', 'Execution ID')
    .option('-r, --reason <reason>', 'Reason recorded on the execution')
    .option('--json', 'Output result as JSON', false)
    .action(async (executionId: string, rawOptions: Record<string, unknown>) => {
      try {
        const options = parseOptions(cancelCommandOptionsSchema, rawOptions);
        if (!options) {
          return;
        }

        const execution = await getServices().engine.cancelExecution(executionId, options.reason);
        print(
          options.json
            ? formatJson(execution)
            : formatSuccess(`Execution cancelled: ${execution.executionId}`)
        );
      } catch (error) {
        reportCommandError(error);
      }
    });
}
