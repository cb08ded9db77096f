import { z } from 'zod';
import { InvalidRequestError, toFailurePayload } from '../errors.js';
import { parseRequest, type ReplRequest } from '../protocol/requests.js';
import type { Supervisor } from '../core/supervisor.js';

const ScriptLineSchema = z.object({
  request: z.unknown(),
  pin: z.boolean().optional(),
});

export interface ScriptEntry {
  /** 1-based line in the script file. */
  line: number;
  request: ReplRequest;
  pin: boolean;
}

export interface ScriptSummary {
  succeeded: number;
  failed: number;
}

/**
 * Parse a JSON-lines script of `{ "request": ..., "pin"?: boolean }` entries.
 * Blank lines are skipped.
 */
export function parseScript(text: string): ScriptEntry[] {
  const entries: ScriptEntry[] = [];
  const lines = text.split('\n');
  for (const [index, raw] of lines.entries()) {
    const trimmed = raw.trim();
    if (trimmed === '') continue;
    const line = index + 1;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      throw new InvalidRequestError(`Line ${line}: not valid JSON`, `line ${line}`);
    }
    const parsed = ScriptLineSchema.safeParse(json);
    if (!parsed.success) {
      throw new InvalidRequestError(`Line ${line}: expected an object with a "request" field`, `line ${line}`);
    }
    try {
      entries.push({ line, request: parseRequest(parsed.data.request), pin: parsed.data.pin ?? false });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new InvalidRequestError(`Line ${line}: ${message}`, `line ${line}`);
    }
  }
  return entries;
}

/**
 * Run every entry in order and write one JSON line per result. A failed
 * entry is written as `{ "line", "failure" }` and the script carries on.
 */
export async function runScript(
  supervisor: Supervisor,
  entries: ScriptEntry[],
  write: (line: string) => void,
): Promise<ScriptSummary> {
  const summary: ScriptSummary = { succeeded: 0, failed: 0 };
  for (const entry of entries) {
    try {
      const result = await supervisor.run(entry.request, { pin: entry.pin });
      write(JSON.stringify({ line: entry.line, result }));
      summary.succeeded++;
    } catch (err) {
      write(JSON.stringify({ line: entry.line, failure: toFailurePayload(err) }));
      summary.failed++;
    }
  }
  return summary;
}
