import { readFile } from 'node:fs/promises';
import { resolve, isAbsolute, join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { SupervisorConfigSchema, type SupervisorConfigParsed } from './schema.js';
import { exists } from '../util/fs.js';

type Parsed = SupervisorConfigParsed;

/**
 * Config as consumed by the supervisor: every path loadConfig resolves is
 * narrowed to a required absolute path.
 */
export interface SupervisorConfig extends Omit<Parsed, 'stateDir' | 'sessionCache' | 'logging'> {
  readonly stateDir: string;
  readonly sessionCache: Parsed['sessionCache'] & { readonly dir: string };
  readonly logging: Parsed['logging'] & { readonly dir: string };
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export const DEFAULT_CONFIG_FILE = 'leanward.config.json';

/**
 * Validate a raw config object and resolve its paths against `baseDir`.
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd()): SupervisorConfig {
  const result = SupervisorConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigLoadError(`Invalid config:\n${issues}`, result.error);
  }

  const config = result.data;
  const resolvePath = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p));

  const stateDir = config.stateDir ? resolvePath(config.stateDir) : join(homedir(), '.leanward');

  const frozen: SupervisorConfig = {
    ...config,
    repl: {
      ...config.repl,
      cwd: config.repl.cwd ? resolvePath(config.repl.cwd) : undefined,
    },
    stateDir,
    sessionCache: {
      ...config.sessionCache,
      dir: config.sessionCache.dir ? resolvePath(config.sessionCache.dir) : join(stateDir, 'session-cache'),
    },
    logging: {
      ...config.logging,
      dir: config.logging.dir ? resolvePath(config.logging.dir) : join(stateDir, 'logs'),
    },
  };

  return Object.freeze(frozen);
}

/**
 * Load, parse, and validate a leanward.config.json file.
 * Relative paths inside it resolve against the file's directory.
 */
export async function loadConfig(configPath: string): Promise<SupervisorConfig> {
  const absPath = isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);

  if (!(await exists(absPath))) {
    throw new ConfigLoadError(`Config file not found: ${absPath}`);
  }

  let raw: unknown;
  try {
    const content = await readFile(absPath, 'utf-8');
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigLoadError(`Failed to parse config file: ${absPath}`, err);
  }

  return parseConfig(raw, dirname(absPath));
}
