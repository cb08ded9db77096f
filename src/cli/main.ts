#!/usr/bin/env node

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import { killAllTrackedProcesses } from '@leanward/repl-transport';
import { loadConfig, DEFAULT_CONFIG_FILE, type SupervisorConfig } from '../config/loader.js';
import { Supervisor } from '../core/supervisor.js';
import { createSessionCache } from '../session/index.js';
import { Logger } from '../logging/logger.js';
import { parseScript, runScript } from './script.js';
import { withCommandHandler } from './command-error-handler.js';

function cliLogger(config: SupervisorConfig): Logger {
  return new Logger({
    source: 'cli',
    logDir: config.logging.dir,
    level: config.logging.level,
    console: config.logging.console,
  });
}

const program = new Command();

program
  .name('leanward')
  .description('Run Lean REPL sessions that survive crashes, hangs and memory exhaustion')
  .version('0.1.0');

// ─── run ──────────────────────────────────────────────
program
  .command('run <script>')
  .description('Execute a JSON-lines script of requests through one supervised REPL')
  .option('-c, --config <path>', 'Path to leanward.config.json', DEFAULT_CONFIG_FILE)
  .action(withCommandHandler(async (script: string, opts: { config: string }) => {
    const config = await loadConfig(opts.config);
    const entries = parseScript(await readFile(script, 'utf-8'));
    const supervisor = new Supervisor(config, { logger: cliLogger(config) });

    try {
      const summary = await runScript(supervisor, entries, (line) => {
        process.stdout.write(line + '\n');
      });
      console.error(chalk.dim(`${summary.succeeded} succeeded, ${summary.failed} failed`));
      if (summary.failed > 0) process.exitCode = 1;
    } finally {
      await supervisor.close();
    }
  }));

// ─── cache ────────────────────────────────────────────
const cache = program.command('cache').description('Inspect or clear the session cache');

cache
  .command('list')
  .description('List pinned session states in creation order')
  .option('-c, --config <path>', 'Path to leanward.config.json', DEFAULT_CONFIG_FILE)
  .action(withCommandHandler(async (opts: { config: string }) => {
    const config = await loadConfig(opts.config);
    const states = await createSessionCache(config.sessionCache, cliLogger(config)).load();
    if (states.length === 0) {
      console.log(chalk.dim(`No pinned states in ${config.sessionCache.dir}`));
      return;
    }
    for (const state of states) {
      console.log(`${chalk.bold(String(state.id).padStart(4))}  ${state.kind.padEnd(10)} ${state.key}  ${chalk.dim(state.createdAt)}`);
    }
  }));

cache
  .command('clear [key]')
  .description('Delete one pinned state (and its dependents) or all of them')
  .option('-c, --config <path>', 'Path to leanward.config.json', DEFAULT_CONFIG_FILE)
  .action(withCommandHandler(async (key: string | undefined, opts: { config: string }) => {
    const config = await loadConfig(opts.config);
    const sessionCache = createSessionCache(config.sessionCache, cliLogger(config));
    await sessionCache.load();
    const removed = await sessionCache.clear(key);
    if (key !== undefined && removed.length === 0) {
      console.log(chalk.yellow(`No pinned state with key ${key}`));
      return;
    }
    console.log(chalk.green(`Removed ${removed.length} pinned state(s)`));
  }));

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  await killAllTrackedProcesses();
  process.exit(signal === 'SIGINT' ? 130 : 143);
};
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

program.parse();
