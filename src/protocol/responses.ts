/**
 * Response model. Payloads the engine does not interpret (info trees,
 * declarations) stay opaque; only the ids and diagnostics are typed.
 *
 * @module
 */
import { z } from 'zod';
import { ProtocolError, type JsonObject } from '@leanward/repl-transport';
import type { StateKind } from '../core/id-registry.js';
import type { RequestFlags } from './requests.js';

const PosSchema = z.object({ line: z.number().int(), column: z.number().int() });

export const MessageSchema = z.object({
  severity: z.enum(['error', 'warning', 'info', 'trace']),
  pos: PosSchema,
  endPos: PosSchema.nullable().optional(),
  data: z.string(),
});

export const SorrySchema = z.object({
  pos: PosSchema,
  endPos: PosSchema.nullable().optional(),
  goal: z.string(),
  proofState: z.number().int().optional(),
});

export const TacticSchema = z.object({
  pos: PosSchema,
  endPos: PosSchema,
  goals: z.string(),
  tactic: z.string(),
  proofState: z.number().int(),
  usedConstants: z.array(z.string()).optional(),
});

const CommandResponseSchema = z.object({
  env: z.number().int(),
  messages: z.array(MessageSchema).default([]),
  sorries: z.array(SorrySchema).default([]),
  tactics: z.array(TacticSchema).optional(),
  infotree: z.unknown().optional(),
  declarations: z.unknown().optional(),
});

const ProofStepResponseSchema = z.object({
  proofState: z.number().int(),
  goals: z.array(z.string()).default([]),
  messages: z.array(MessageSchema).default([]),
  sorries: z.array(SorrySchema).default([]),
  traces: z.array(z.string()).optional(),
  proofStatus: z.string().optional(),
});

const LeanErrorSchema = z.object({ message: z.string() });

export type Message = z.infer<typeof MessageSchema>;
export type Sorry = z.infer<typeof SorrySchema>;
export type Tactic = z.infer<typeof TacticSchema>;

export type CommandResponse = { kind: 'command' } & z.infer<typeof CommandResponseSchema>;
export type ProofStepResponse = { kind: 'proofStep' } & z.infer<typeof ProofStepResponseSchema>;
/** The REPL rejected the input. A normal response, not a transport failure. */
export type LeanErrorResponse = { kind: 'error' } & z.infer<typeof LeanErrorSchema>;

export type ReplResponse = CommandResponse | ProofStepResponse | LeanErrorResponse;

export function isLeanError(response: ReplResponse): response is LeanErrorResponse {
  return response.kind === 'error';
}

/**
 * Validate a decoded frame against the response shape the request expects.
 * Sub-fields the request did not ask for are dropped.
 */
export function parseResponse(
  frame: JsonObject,
  expected: 'command' | 'proofStep',
  flags: RequestFlags = {},
): ReplResponse {
  const idField = expected === 'command' ? 'env' : 'proofState';
  if (!(idField in frame) && typeof frame.message === 'string') {
    return { kind: 'error', message: frame.message };
  }

  if (expected === 'proofStep') {
    const result = ProofStepResponseSchema.safeParse(frame);
    if (!result.success) throw invalidShape(frame, result.error);
    return { kind: 'proofStep', ...result.data };
  }

  const result = CommandResponseSchema.safeParse(frame);
  if (!result.success) throw invalidShape(frame, result.error);
  const response: CommandResponse = { kind: 'command', ...result.data };
  if (!flags.allTactics) delete response.tactics;
  if (!flags.infotree) delete response.infotree;
  if (!flags.declarations) delete response.declarations;
  return response;
}

function invalidShape(frame: JsonObject, error: z.ZodError): ProtocolError {
  const issue = error.issues[0];
  const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown';
  return new ProtocolError(`Unexpected response shape (${where})`, JSON.stringify(frame));
}

/**
 * Copy of the response with every minted id passed through `map`, nested
 * proof states in sorries and tactics included.
 */
export function mapResponseIds(response: ReplResponse, map: (id: number, kind: StateKind) => number): ReplResponse {
  switch (response.kind) {
    case 'error':
      return response;
    case 'command':
      return {
        ...response,
        env: map(response.env, 'env'),
        sorries: mapSorries(response.sorries, map),
        ...(response.tactics
          ? { tactics: response.tactics.map((t) => ({ ...t, proofState: map(t.proofState, 'proofState') })) }
          : {}),
      };
    case 'proofStep':
      return {
        ...response,
        proofState: map(response.proofState, 'proofState'),
        sorries: mapSorries(response.sorries, map),
      };
  }
}

function mapSorries(sorries: Sorry[], map: (id: number, kind: StateKind) => number): Sorry[] {
  return sorries.map((s) => (s.proofState === undefined ? s : { ...s, proofState: map(s.proofState, 'proofState') }));
}

/** The id a successful response minted. */
export function mintedId(response: CommandResponse | ProofStepResponse): number {
  return response.kind === 'command' ? response.env : response.proofState;
}

/** Count of error-severity diagnostics. */
export function errorCount(response: ReplResponse): number {
  if (response.kind === 'error') return 1;
  return response.messages.filter((m) => m.severity === 'error').length;
}
