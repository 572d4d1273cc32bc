import { Command } from 'commander';
import type { ServiceProvider } from '../context.js';
import { startCommandOptionsSchema } from '../validators.js';
import { print, formatExecutionDetail, formatJson, formatSuccess } from '../formatter.js';
import { parseOptions, reportCommandError } from './shared.js';

/**
 * Create the start command.
 */
export function createStartCommand(getServices: ServiceProvider): Command {
  return new Command('start')
    .description('Start an execution from a stored plan or a new question')
    .option('--plan <planId>', 'Plan to execute')
    .option('-q, --question <question>', 'Build a plan for this question first')
    .option('--scene <scene>', 'Scene tag for a new plan')
    .option('--category <category>', 'Force the category of a new plan')
    .option('--no-auto-start', 'Leave the execution pending until a task is started')
    .option('--json', 'Output result as JSON', false)
    .action(async (rawOptions: Record<string, unknown>) => {
      try {
        const options = parseOptions(startCommandOptionsSchema, rawOptions);
        if (!options) {
          return;
        }

        const execution = await getServices().engine.startExecution({
          planId: options.plan,
          question: options.question,
          scene: options.scene,
          category: options.category,
          autoStart: options.autoStart,
        });

        if (options.json) {
          print(formatJson(execution));
          return;
        }
        print(formatSuccess(`Execution started: ${execution.executionId}`));
        print('');
        print(formatExecutionDetail(execution));
      } catch (error) {
        reportCommandError(error);
      }
    });
}
