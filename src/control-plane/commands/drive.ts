import { Command } from 'commander';
import type { ServiceProvider } from '../context.js';
import { jsonOptionsSchema, runCommandOptionsSchema } from '../validators.js';
import { print, formatExecutionDetail, formatJson } from '../formatter.js';
import { parseOptions, reportCommandError } from './shared.js';

/**
 * Create the tick command.
 */
export function createTickCommand(getServices: ServiceProvider): Command {
  return new Command('tick')
    .description('Advance an execution by one automatic step')
    .argument('<executionId>', 'Execution ID')
    .option('--json', 'Output result as JSON', false)
    .action(async (executionId: string, rawOptions: Record<string, unknown>) => {
      try {
        const options = parseOptions(jsonOptionsSchema, rawOptions);
        if (!options) {
          return;
        }

        const execution = await getServices().engine.tick(executionId);
        print(options.json ? formatJson(execution) : formatExecutionDetail(execution));
      } catch (error) {
        reportCommandError(error);
      }
    });
}

/**
 * Create the run command.
 */
export function createRunCommand(getServices: ServiceProvider): Command {
  return new Command('run')
    .description('Tick an execution until it finishes or the step budget runs out')
    .argument('<executionId>', 'Execution ID')
    .option('-m, --max-steps <n>', 'Maximum number of ticks (1-200)')
    .option('--json', 'Output result as JSON', false)
    .action(async (executionId: string, rawOptions: Record<string, unknown>) => {
      try {
        const options = parseOptions(runCommandOptionsSchema, rawOptions);
        if (!options) {
          return;
        }

        const execution = await getServices().engine.run(executionId, options.maxSteps);
        print(options.json ? formatJson(execution) : formatExecutionDetail(execution));
      } catch (error) {
        reportCommandError(error);
      }
    });
}
