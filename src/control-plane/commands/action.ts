import { Command } from 'commander';
import type { ServiceProvider } from '../context.js';
import { actionCommandOptionsSchema } from '../validators.js';
import { print, formatExecutionDetail, formatJson, formatSuccess } from '../formatter.js';
import { TASK_ACTIONS } from '../../types/index.js';
import { parseOptions, reportCommandError } from './shared.js';

/**
 * Create the action command.
 */
export function createActionCommand(getServices: ServiceProvider): Command {
  return new Command('action')
    .description(`Apply a manual task action (${TASK_ACTIONS.join(', ')})`)
    .argument('<executionId>', 'Execution ID')
    .argument('<taskId>', 'Task ID, e.g. task_1')
    .argument('<action>', 'Action to apply')
    .option('-n, --note <note>', 'Note stored as output summary or error')
    .option('--json', 'Output result as JSON', false)
    .action(
      async (
        executionId: string,
        taskId: string,
        action: string,
        rawOptions: Record<string, unknown>
      ) => {
        try {
          const options = parseOptions(actionCommandOptionsSchema, rawOptions);
          if (!options) {
            return;
          }

          const execution = await getServices().engine.taskAction(
            executionId,
            taskId,
            action,
            options.note
          );

          if (options.json) {
            print(formatJson(execution));
            return;
          }
          print(formatSuccess(`${taskId} -> ${action}`));
          print('');
          print(formatExecutionDetail(execution));
        } catch (error) {
          reportCommandError(error);
        }
      }
    );
}
