import chalk from 'chalk';
import { killAllTrackedProcesses } from '@leanward/repl-transport';
import { InvalidRequestError, RestartAttemptsExhaustedError } from '../errors.js';
import { ConfigLoadError } from '../config/loader.js';

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof ConfigLoadError || err instanceof InvalidRequestError) {
    console.error(chalk.red(`Error: ${err.message}`));
    process.exit(2);
  } else if (err instanceof RestartAttemptsExhaustedError) {
    console.error(chalk.red(`Error: ${err.message}`));
    console.error(chalk.yellow(`  last failure: ${err.lastError.name}: ${err.lastError.message}`));
    process.exit(1);
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${msg}`));
    process.exit(1);
  }
}

/**
 * Wrap an async commander action handler with standardized error handling.
 * REPL processes still running when the action fails are terminated first.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      await killAllTrackedProcesses();
      handleCommandError(err);
    }
  };
}
