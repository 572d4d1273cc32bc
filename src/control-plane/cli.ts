import { Command } from 'commander';
import { defaultServiceProvider, type ServiceProvider } from './context.js';
import { createPlanCommand, createPlansCommand } from './commands/plan.js';
import { createStartCommand } from './commands/start.js';
import { createStatusCommand } from './commands/status.js';
import { createListCommand } from './commands/list.js';
import { createActionCommand } from './commands/action.js';
import { createTickCommand, createRunCommand } from './commands/drive.js';
import { createCancelCommand } from './commands/cancel.js';
import { createLogsCommand } from './commands/logs.js';
import { createServeCommand } from './commands/serve.js';
import { VERSION } from '../server/routes/health.js';

/**
 * Create and configure the CLI program.
 */
export function createProgram(getServices: ServiceProvider = defaultServiceProvider): Command {
  const program = new Command();

  program
    .name('plancraft')
    .description('Plan business questions into agent tasks and drive their execution')
    .version(VERSION, '-v, --version', 'Output the current version');

  program.addCommand(createPlanCommand(getServices));
  program.addCommand(createPlansCommand(getServices));
  program.addCommand(createStartCommand(getServices));
  program.addCommand(createStatusCommand(getServices));
  program.addCommand(createListCommand(getServices));
  program.addCommand(createActionCommand(getServices));
  program.addCommand(createTickCommand(getServices));
  program.addCommand(createRunCommand(getServices));
  program.addCommand(createCancelCommand(getServices));
  program.addCommand(createLogsCommand(getServices));
  program.addCommand(createServeCommand(getServices));

  // Error handling
  program.exitOverride();

  return program;
}

/**
 * Run the CLI program.
 */
export async function runCli(
  args: string[] = process.argv,
  getServices?: ServiceProvider
): Promise<void> {
  const program = createProgram(getServices);

  try {
    await program.parseAsync(args);
  } catch (error) {
    // Commander throws an error on --help and --version
    // We don't want to treat these as errors
    if (
      error instanceof Error &&
      'code' in error &&
      (error.code === 'commander.helpDisplayed' ||
        error.code === 'commander.version')
    ) {
      return;
    }

    // Re-throw other errors
    throw error;
  }
}
