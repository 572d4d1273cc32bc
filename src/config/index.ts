/**
 * Plancraft Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Paths
  dataDir: z.string().default('.plancraft/data'),

  // Ring buffer caps for the planning document
  planHistoryLimit: z.coerce.number().int().min(1).max(10000).default(300),
  executionLimit: z.coerce.number().int().min(1).max(10000).default(500),
  executionLogLimit: z.coerce.number().int().min(1).max(100000).default(2000),

  // Automatic driver budget used when run() gets no explicit maxSteps
  defaultMaxSteps: z.coerce.number().int().min(1).max(200).default(20),

  // Self-correction loop
  correctionMaxRetries: z.coerce.number().int().min(0).max(10).default(3),

  // Server
  port: z.coerce.number().int().min(1).max(65535).default(3001),
  host: z.string().default('0.0.0.0'),
});

export type PlancraftConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlancraftConfig {
  const raw = {
    dataDir: env['PLANCRAFT_DATA_DIR'],
    planHistoryLimit: env['PLANCRAFT_PLAN_HISTORY_LIMIT'],
    executionLimit: env['PLANCRAFT_EXECUTION_LIMIT'],
    executionLogLimit: env['PLANCRAFT_EXECUTION_LOG_LIMIT'],
    defaultMaxSteps: env['PLANCRAFT_DEFAULT_MAX_STEPS'],
    correctionMaxRetries: env['PLANCRAFT_CORRECTION_MAX_RETRIES'],
    port: env['PLANCRAFT_PORT'],
    host: env['PLANCRAFT_HOST'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.debug(
    {
      dataDir: result.data.dataDir,
      planHistoryLimit: result.data.planHistoryLimit,
      executionLimit: result.data.executionLimit,
      executionLogLimit: result.data.executionLogLimit,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Singleton configuration instance
 */
let configInstance: PlancraftConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): PlancraftConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
