import { spawn, type SpawnOptions } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import type { Readable, Writable } from 'node:stream';

export interface ExitInfo {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned or errored before exiting. */
  error?: string;
}

export interface ProcessHandleInit {
  pid?: number;
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  /** Settles once, when the process has exited and been reaped. */
  exited: Promise<ExitInfo>;
  kill: (signal: NodeJS.Signals) => void;
}

export interface SpawnReplOpts {
  cwd?: string;
  env?: Record<string, string | undefined>;
  /** Virtual memory ceiling applied with `ulimit -v` before exec (Linux only). */
  memoryHardLimitMb?: number;
  platform?: NodeJS.Platform;
}

const STDERR_TAIL_BYTES = 8192;

/**
 * A live REPL process and its pipes. Created once per spawn and discarded on
 * restart; never reattached to a new process.
 */
export class ProcessHandle {
  readonly id: string = randomUUID();
  readonly pid: number | undefined;
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exited: Promise<ExitInfo>;
  readonly startedAt: number = Date.now();
  /** The OS process that spawned this handle; the only one allowed to use it. */
  readonly ownerPid: number = process.pid;

  private exitInfo: ExitInfo | null = null;
  private stderrTail = '';
  private readonly killFn: (signal: NodeJS.Signals) => void;

  constructor(init: ProcessHandleInit) {
    this.pid = init.pid;
    this.stdin = init.stdin;
    this.stdout = init.stdout;
    this.stderr = init.stderr;
    this.killFn = init.kill;
    this.exited = init.exited.then((info) => {
      this.exitInfo = info;
      return info;
    });

    this.stderr.setEncoding('utf-8');
    this.stderr.on('data', (chunk: string) => {
      this.stderrTail = (this.stderrTail + chunk).slice(-STDERR_TAIL_BYTES);
    });
    // A closed stdin after exit surfaces as EPIPE on the next write; the
    // transport reports that, so the stream-level event is not fatal here.
    this.stdin.on('error', () => undefined);
  }

  get alive(): boolean {
    return this.exitInfo === null;
  }

  get exit(): ExitInfo | null {
    return this.exitInfo;
  }

  /** Last few kilobytes written to stderr. */
  get stderrFragment(): string {
    return this.stderrTail;
  }

  assertOwner(): void {
    if (process.pid !== this.ownerPid) {
      throw new Error(
        `Process handle ${this.id} belongs to OS process ${this.ownerPid} and cannot be used from ${process.pid}`,
      );
    }
  }

  /**
   * Best-effort terminate and reap: SIGTERM, then SIGKILL after the grace period.
   */
  async terminate(graceMs = 2000): Promise<ExitInfo> {
    if (this.exitInfo) return this.exitInfo;

    this.sendSignal('SIGTERM');
    let timer: ReturnType<typeof setTimeout> | undefined;
    const forced = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        if (this.alive) this.sendSignal('SIGKILL');
        resolve();
      }, graceMs);
    });

    await Promise.race([this.exited, forced]);
    if (timer) clearTimeout(timer);
    return this.exited;
  }

  private sendSignal(signal: NodeJS.Signals): void {
    try {
      this.killFn(signal);
    } catch {
      // Already gone
    }
  }
}

/**
 * Wrap the REPL command so the shell applies a virtual memory limit and then
 * execs the REPL in place (the pid stays the REPL's).
 */
export function buildLaunchCommand(
  command: string,
  args: string[],
  memoryHardLimitMb: number | undefined,
  platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
  if (memoryHardLimitMb === undefined || platform !== 'linux') {
    return { command, args };
  }
  const limitKb = Math.floor(memoryHardLimitMb * 1024);
  return {
    command: '/bin/sh',
    args: ['-c', `ulimit -v ${limitKb} && exec "$0" "$@"`, command, ...args],
  };
}

/**
 * Spawn the REPL with piped stdio and wrap it in a ProcessHandle.
 */
export function spawnRepl(command: string, args: string[], opts: SpawnReplOpts = {}): ProcessHandle {
  const launch = buildLaunchCommand(command, args, opts.memoryHardLimitMb, opts.platform);
  const spawnOpts: SpawnOptions = {
    cwd: opts.cwd,
    env: opts.env ? { ...process.env, ...opts.env } : process.env,
    stdio: ['pipe', 'pipe', 'pipe'],
  };

  const child = spawn(launch.command, launch.args, spawnOpts);
  const { stdin, stdout, stderr } = child;
  if (!stdin || !stdout || !stderr) {
    child.kill('SIGKILL');
    throw new Error(`Failed to open stdio pipes for ${command}`);
  }

  const exited = new Promise<ExitInfo>((resolve) => {
    // 'close' fires after stdio has drained, so no response bytes are lost.
    child.once('close', (code, signal) => {
      resolve({ exitCode: code, signal });
    });
    child.once('error', (err) => {
      resolve({ exitCode: null, signal: null, error: err.message });
    });
  });

  const handle = new ProcessHandle({
    pid: child.pid,
    stdin,
    stdout,
    stderr,
    exited,
    kill: (signal) => {
      child.kill(signal);
    },
  });
  trackProcess(handle);
  return handle;
}

/**
 * Live REPL processes that need cleanup on shutdown.
 */
const activeProcesses = new Set<ProcessHandle>();

export function trackProcess(handle: ProcessHandle): void {
  activeProcesses.add(handle);
  void handle.exited.then(() => activeProcesses.delete(handle));
}

export async function killAllTrackedProcesses(graceMs = 2000): Promise<void> {
  const handles = [...activeProcesses];
  activeProcesses.clear();
  await Promise.all(handles.map((handle) => handle.terminate(graceMs)));
}

export function getTrackedProcessCount(): number {
  return activeProcesses.size;
}
