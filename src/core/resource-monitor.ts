import { readdir, readFile } from 'node:fs/promises';
import { freemem, totalmem } from 'node:os';

export interface ResourceSample {
  /** RSS of the process tree as a fraction of the hard limit, or of total memory without one. */
  readonly processMemoryFraction: number;
  readonly processRssBytes: number;
  /** Memory in use system-wide, 0.0 to 1.0. */
  readonly systemMemoryFraction: number;
  readonly elapsedSinceStartMs: number;
}

export interface ResourceThresholds {
  maxTotalMemory: number;
  maxProcessMemory: number;
  hardLimitMb?: number;
  maxUptimeMs?: number;
}

export type BreachReason = 'system-memory' | 'process-memory' | 'uptime';

export interface ResourceBreach {
  reason: BreachReason;
  observed: number;
  limit: number;
  sample: ResourceSample;
}

/** The process being watched. */
export interface MonitoredProcess {
  pid: number | undefined;
  startedAt: number;
}

/** Sources the monitor reads from; replaced in tests. */
export interface ResourceProbes {
  readRssBytes: (pid: number) => Promise<number | null>;
  totalMemoryBytes: () => number;
  freeMemoryBytes: () => number;
  now: () => number;
}

/** Reads of the /proc filesystem; replaced in tests. */
export interface ProcReader {
  /** Contents of /proc/<pid>/status, or null once the process is gone. */
  readStatus(pid: number): Promise<string | null>;
  /** Direct children of every thread of the process. */
  readChildren(pid: number): Promise<number[]>;
}

export const procFs: ProcReader = {
  async readStatus(pid) {
    try {
      return await readFile(`/proc/${pid}/status`, 'utf-8');
    } catch {
      return null;
    }
  },
  async readChildren(pid) {
    let tasks: string[];
    try {
      tasks = await readdir(`/proc/${pid}/task`);
    } catch {
      return [];
    }
    const children: number[] = [];
    for (const task of tasks) {
      let content: string;
      try {
        content = await readFile(`/proc/${pid}/task/${task}/children`, 'utf-8');
      } catch {
        continue;
      }
      for (const field of content.split(/\s+/)) {
        if (/^\d+$/.test(field)) children.push(Number.parseInt(field, 10));
      }
    }
    return children;
  },
};

function parseVmRss(status: string): number | null {
  const match = /^VmRSS:\s+(\d+)\s+kB/m.exec(status);
  return match ? Number.parseInt(match[1], 10) * 1024 : null;
}

/**
 * Resident set size from /proc/<pid>/status. Null off Linux or once the
 * process is gone.
 */
export async function readProcRssBytes(pid: number, proc: ProcReader = procFs): Promise<number | null> {
  const status = await proc.readStatus(pid);
  return status === null ? null : parseVmRss(status);
}

/**
 * RSS of a process and all of its descendants. The REPL usually runs as a
 * child of its launcher (`lake exe repl`), so the launcher's own RSS is not
 * enough. Null when the root process itself cannot be read.
 */
export async function readProcTreeRssBytes(pid: number, proc: ProcReader = procFs): Promise<number | null> {
  const root = await readProcRssBytes(pid, proc);
  if (root === null) return null;

  let total = root;
  const seen = new Set<number>([pid]);
  const pending = await proc.readChildren(pid);
  for (let child = pending.pop(); child !== undefined; child = pending.pop()) {
    if (seen.has(child)) continue;
    seen.add(child);
    total += (await readProcRssBytes(child, proc)) ?? 0;
    pending.push(...(await proc.readChildren(child)));
  }
  return total;
}

export const defaultProbes: ResourceProbes = {
  readRssBytes: (pid) => readProcTreeRssBytes(pid),
  totalMemoryBytes: totalmem,
  freeMemoryBytes: freemem,
  now: Date.now,
};

/**
 * Samples the REPL's memory, system memory and uptime. Reads only; the
 * supervisor decides when to act on a breach.
 */
export class ResourceMonitor {
  private readonly probes: ResourceProbes;

  constructor(
    private readonly thresholds: ResourceThresholds,
    probes: Partial<ResourceProbes> = {},
  ) {
    this.probes = { ...defaultProbes, ...probes };
  }

  async sample(target: MonitoredProcess): Promise<ResourceSample> {
    const total = this.probes.totalMemoryBytes();
    const free = this.probes.freeMemoryBytes();
    const rss = target.pid !== undefined ? ((await this.probes.readRssBytes(target.pid)) ?? 0) : 0;
    const processBudget =
      this.thresholds.hardLimitMb !== undefined ? this.thresholds.hardLimitMb * 1024 * 1024 : total;

    return {
      processMemoryFraction: processBudget > 0 ? rss / processBudget : 0,
      processRssBytes: rss,
      systemMemoryFraction: total > 0 ? (total - free) / total : 0,
      elapsedSinceStartMs: Math.max(0, this.probes.now() - target.startedAt),
    };
  }

  /**
   * First threshold the sample crosses, or null.
   */
  check(sample: ResourceSample): ResourceBreach | null {
    const { maxTotalMemory, maxProcessMemory, maxUptimeMs } = this.thresholds;
    if (sample.systemMemoryFraction > maxTotalMemory) {
      return { reason: 'system-memory', observed: sample.systemMemoryFraction, limit: maxTotalMemory, sample };
    }
    if (sample.processMemoryFraction > maxProcessMemory) {
      return { reason: 'process-memory', observed: sample.processMemoryFraction, limit: maxProcessMemory, sample };
    }
    if (maxUptimeMs !== undefined && sample.elapsedSinceStartMs > maxUptimeMs) {
      return { reason: 'uptime', observed: sample.elapsedSinceStartMs, limit: maxUptimeMs, sample };
    }
    return null;
  }
}
