/**
 * Shared start-up for the command-line scripts
 */

import {
  type AppConfig,
  type Logger,
  ConfigError,
  createRootLogger,
  loadConfig,
} from '../../lib/src/index.js';

/**
 * Load the environment config and a root logger, or print every rejected
 * variable and exit.
 */
export function setupScript(source: string): { config: AppConfig; logger: Logger } {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('');
      console.error('ERROR: Environment configuration is invalid.');
      console.error('');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      console.error('');
      process.exit(1);
    }
    throw error;
  }

  const logger = createRootLogger({
    level: config.logging.level,
    format: config.logging.format,
    source,
  });
  return { config, logger };
}

export function printBanner(title: string): void {
  console.log('='.repeat(60));
  console.log(title);
  console.log('='.repeat(60));
  console.log('');
}
