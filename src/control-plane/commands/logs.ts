import { Command } from 'commander';
import type { ServiceProvider } from '../context.js';
import { logsCommandOptionsSchema } from '../validators.js';
import { print, formatJson, formatLogList } from '../formatter.js';
import { parseOptions, reportCommandError } from './shared.js';

/**
 * Create the logs command.
 */
export function createLogsCommand(getServices: ServiceProvider): Command {
  return new Command('logs')
    .description('Show the execution log, newest first')
    .option('-e, --execution <executionId>', 'Only entries for this execution')
    .option('-l, --limit <n>', 'Maximum number of entries to show', '50')
    .option('--json', 'Output result as JSON', false)
    .action(async (rawOptions: Record<string, unknown>) => {
      try {
        const options = parseOptions(logsCommandOptionsSchema, rawOptions);
        if (!options) {
          return;
        }

        const items = await getServices().executionLog.list({
          limit: options.limit,
          executionId: options.execution,
        });
        print(options.json ? formatJson(items) : formatLogList(items));
      } catch (error) {
        reportCommandError(error);
      }
    });
}
