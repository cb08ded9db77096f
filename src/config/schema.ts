import { z } from 'zod';
import { OptionValueSchema } from '../protocol/requests.js';

const ReplConfigSchema = z
  .object({
    /** Executable that starts the REPL. */
    command: z.string().min(1).default('lake'),
    /** Arguments passed to the command. */
    args: z.array(z.string()).default(['exe', 'repl']),
    /** Working directory of the REPL (usually the Lean project root). */
    cwd: z.string().optional(),
    /** Extra environment variables merged over the parent's. */
    env: z.record(z.string(), z.string()).optional(),
  })
  .default({});

const MemoryConfigSchema = z
  .object({
    /** Restart when system memory use exceeds this fraction. */
    maxTotalMemory: z.number().gt(0).max(1).default(0.8),
    /** Restart when the REPL's RSS exceeds this fraction of hardLimitMb, or of total memory. */
    maxProcessMemory: z.number().gt(0).max(1).default(0.8),
    /** Virtual memory ceiling applied with `ulimit -v` (Linux only). */
    hardLimitMb: z.number().int().positive().optional(),
  })
  .default({});

const RestartConfigSchema = z
  .object({
    /** Dispatch attempts per request, first try included. */
    maxAttempts: z.number().int().min(1).default(5),
    /** Retry a timed-out request on a fresh process instead of surfacing the timeout. */
    retryOnTimeout: z.boolean().default(false),
    /** Wait between SIGTERM and SIGKILL. */
    terminateGraceMs: z.number().int().min(0).default(2000),
    /** Recycle the process once it has been up this long. */
    maxUptimeMs: z.number().int().positive().optional(),
  })
  .default({});

const TimeoutsConfigSchema = z
  .object({
    /** Bound on each request's response read. */
    requestMs: z.number().int().positive().optional(),
    /** Bound on each replayed state during a restart. */
    replayMs: z.number().int().positive().optional(),
  })
  .default({});

const ElaborationConfigSchema = z
  .object({
    enableIncrementalOptimization: z.boolean().default(true),
    enableParallelElaboration: z.boolean().default(true),
    /** Options applied to every command before the caller's own. */
    defaultOptions: z.record(z.string(), OptionValueSchema).default({}),
  })
  .default({});

const SessionCacheConfigSchema = z
  .object({
    /** Defaults to `<stateDir>/session-cache`. */
    dir: z.string().optional(),
    strategy: z.enum(['replay', 'pickle']).default('replay'),
    maxEntries: z.number().int().positive().optional(),
    maxAgeMs: z.number().int().positive().optional(),
  })
  .default({});

const LoggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    console: z.boolean().default(false),
    /** Defaults to `<stateDir>/logs`. */
    dir: z.string().optional(),
  })
  .default({});

export const SupervisorConfigSchema = z.object({
  repl: ReplConfigSchema,
  memory: MemoryConfigSchema,
  restart: RestartConfigSchema,
  timeouts: TimeoutsConfigSchema,
  elaboration: ElaborationConfigSchema,
  sessionCache: SessionCacheConfigSchema,
  logging: LoggingConfigSchema,
  /** Directory for the session cache and logs. Defaults to `~/.leanward`. */
  stateDir: z.string().optional(),
});

export type SupervisorConfigInput = z.input<typeof SupervisorConfigSchema>;
export type SupervisorConfigParsed = z.infer<typeof SupervisorConfigSchema>;
export type SessionCacheStrategy = SupervisorConfigParsed['sessionCache']['strategy'];
