/**
 * Newline framing for the REPL protocol.
 *
 * A request is one JSON document on a single line followed by a blank line.
 * A response is a JSON document that may span several lines and ends at the
 * first blank line after it.
 *
 * @module
 */
import { ProtocolError } from './errors.js';

export type JsonObject = { [key: string]: unknown };

/** Request terminator: end of the JSON line plus one empty line. */
export const FRAME_TERMINATOR = '\n\n';

/**
 * Encode a request as a single write.
 */
export function encodeFrame(payload: JsonObject): string {
  // JSON.stringify escapes newlines inside strings, so the body is one line.
  return JSON.stringify(payload) + FRAME_TERMINATOR;
}

/**
 * Decode one complete response frame.
 * Throws ProtocolError when the text is not a JSON object.
 */
export function decodeFrame(text: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ProtocolError(`Malformed response frame: ${reason}`, text);
  }
  if (!isJsonObject(parsed)) {
    throw new ProtocolError('Response frame is not a JSON object', text);
  }
  return parsed;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accumulates stdout chunks and cuts them into response frames.
 *
 * Lines are buffered until a blank line follows at least one non-blank line;
 * leading blank lines between frames are skipped.
 */
export class ResponseFramer {
  private partialLine = '';
  private lines: string[] = [];

  /**
   * Feed a chunk; returns the text of every frame it completed, in order.
   */
  push(chunk: string): string[] {
    const frames: string[] = [];
    const data = this.partialLine + chunk;
    const parts = data.split('\n');
    this.partialLine = parts.pop() ?? '';

    for (const raw of parts) {
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
      if (line.trim() === '') {
        if (this.lines.length > 0) {
          frames.push(this.lines.join('\n'));
          this.lines = [];
        }
        continue;
      }
      this.lines.push(line);
    }
    return frames;
  }

  /** True while part of a frame has been read but not its terminator. */
  get hasPartial(): boolean {
    return this.lines.length > 0 || this.partialLine.trim() !== '';
  }

  /** Buffered text that does not yet form a frame. */
  get pending(): string {
    return [...this.lines, this.partialLine].join('\n');
  }

  reset(): void {
    this.partialLine = '';
    this.lines = [];
  }
}
