import { Command } from 'commander';
import type { ServiceProvider } from '../context.js';
import { serveOptionsSchema } from '../validators.js';
import { startServer, stopServer } from '../../server/index.js';
import { PLANNING_PREFIX } from '../../server/routes/planning.js';
import { getConfig } from '../../config/index.js';
import { errorMessage } from '../../utils/errors.js';
import { print, printError, formatError, bold, cyan } from '../formatter.js';
import { parseOptions, reportCommandError } from './shared.js';

/**
 * Create the serve command.
 */
export function createServeCommand(getServices: ServiceProvider): Command {
  return new Command('serve')
    .description('Start the planning HTTP server')
    .option('-p, --port <port>', 'Port to listen on (default: PLANCRAFT_PORT or 3001)')
    .option('-H, --host <host>', 'Host to bind to (default: PLANCRAFT_HOST or 0.0.0.0)')
    .option('--cors-origin <origin>', 'CORS origin to allow (can specify multiple with comma)')
    .action(async (rawOptions: Record<string, unknown>) => {
      try {
        await executeServe(getServices, rawOptions);
      } catch (error) {
        reportCommandError(error);
      }
    });
}

/**
 * Execute the serve command.
 */
async function executeServe(
  getServices: ServiceProvider,
  rawOptions: Record<string, unknown>
): Promise<void> {
  const options = parseOptions(serveOptionsSchema, rawOptions);
  if (!options) {
    return;
  }

  const config = getConfig();
  const port = options.port ?? config.port;
  const host = options.host ?? config.host;
  const corsOrigins = options.corsOrigin
    ? options.corsOrigin.split(',').map((o) => o.trim())
    : ['*'];

  print(`Starting planning server...`);
  print('');
  print(`${bold('Port:')} ${cyan(String(port))}`);
  print(`${bold('Host:')} ${cyan(host)}`);
  print(`${bold('Data:')} ${cyan(config.dataDir)}`);
  print(`${bold('CORS Origins:')} ${cyan(corsOrigins.join(', '))}`);
  print('');

  const server = await startServer({
    port,
    host,
    corsOrigins,
    services: getServices(),
  });

  // Handle shutdown signals
  const shutdown = (): void => {
    print('');
    print('Shutting down server...');
    stopServer(server).then(() => {
      print('Server stopped');
      process.exit(0);
    }).catch((err: unknown) => {
      printError(formatError(errorMessage(err)));
      process.exit(1);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  print(`Server is running at ${cyan(`http://${host}:${port}`)}`);
  print('');
  print('Available endpoints:');
  print(`  ${cyan('GET')}  /health`);
  print(`  ${cyan('GET')}  ${PLANNING_PREFIX}/rules, /chains, /plans, /executions, /execution`);
  print(`  ${cyan('POST')} ${PLANNING_PREFIX}/plan, /executions/start, /executions/:id/{task-action,tick,run,cancel}`);
  print('');
  print('Press Ctrl+C to stop the server');
}
