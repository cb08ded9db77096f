import { vi } from 'vitest';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Logger } from '../../src/logging/logger.js';
import { parseConfig, type SupervisorConfig } from '../../src/config/loader.js';
import type { SupervisorConfigInput } from '../../src/config/schema.js';
import { ResourceMonitor, type ResourceProbes } from '../../src/core/resource-monitor.js';

export function makeMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    event: vi.fn(),
    child: vi.fn(),
  } as unknown as Logger;
}

export async function makeTempDir(prefix = 'leanward-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/**
 * Config rooted at `stateDir` with a short termination grace period.
 */
export function makeConfig(stateDir: string, overrides: Omit<SupervisorConfigInput, 'stateDir'> = {}): SupervisorConfig {
  return parseConfig(
    {
      ...overrides,
      restart: { terminateGraceMs: 10, ...overrides.restart },
      stateDir,
    },
    stateDir,
  );
}

export interface MemoryGauge {
  /** Fraction of system memory reported as in use. */
  systemUsed: number;
  /** RSS reported for every pid. */
  rssBytes: number;
}

/**
 * A monitor whose readings come from `gauge` (total memory is 1000 bytes).
 * Starts below every default threshold.
 */
export function makeMonitor(
  gauge: MemoryGauge = { systemUsed: 0, rssBytes: 0 },
  thresholds: { maxTotalMemory?: number; maxProcessMemory?: number; maxUptimeMs?: number } = {},
): ResourceMonitor {
  const probes: ResourceProbes = {
    readRssBytes: async () => gauge.rssBytes,
    totalMemoryBytes: () => 1000,
    freeMemoryBytes: () => 1000 - gauge.systemUsed * 1000,
    now: () => Date.now(),
  };
  return new ResourceMonitor(
    {
      maxTotalMemory: thresholds.maxTotalMemory ?? 0.8,
      maxProcessMemory: thresholds.maxProcessMemory ?? 0.8,
      maxUptimeMs: thresholds.maxUptimeMs,
    },
    probes,
  );
}
