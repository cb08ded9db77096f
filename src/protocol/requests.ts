/**
 * Request model for the Lean REPL and its wire encoding.
 *
 * Requests are a discriminated union on `kind`. Parent ids inside a request are
 * the ids the caller holds (public or pinned); the supervisor rewrites them to
 * the live REPL's ids before encoding.
 *
 * @module
 */
import { z } from 'zod';
import type { JsonObject } from '@leanward/repl-transport';
import { InvalidRequestError } from '../errors.js';
import type { StateKind } from '../core/id-registry.js';

// ── Options ──

export const OptionValueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('bool'), value: z.boolean() }),
  z.object({ type: z.literal('nat'), value: z.number().int().min(0) }),
  z.object({ type: z.literal('string'), value: z.string() }),
  z.object({ type: z.literal('name'), value: z.string().min(1) }),
]);

export type OptionValue = z.infer<typeof OptionValueSchema>;

/** Options keyed by dotted name, e.g. `pp.all` or `maxHeartbeats`. */
export type OptionMap = Record<string, OptionValue>;

const NAME_SEGMENT = /^[A-Za-z_][A-Za-z0-9_'!?]*$/;

// ── Requests ──

const id = z.number().int();

const FlagsShape = {
  allTactics: z.boolean().optional(),
  rootGoals: z.boolean().optional(),
  infotree: z.enum(['full', 'tactics', 'original', 'substantive']).optional(),
  declarations: z.boolean().optional(),
  options: z.record(z.string(), OptionValueSchema).optional(),
};

export const CommandRequestSchema = z.object({
  kind: z.literal('command'),
  cmd: z.string(),
  env: id.optional(),
  ...FlagsShape,
});

export const FileCommandRequestSchema = z.object({
  kind: z.literal('fileCommand'),
  path: z.string().min(1),
  env: id.optional(),
  ...FlagsShape,
});

export const ProofStepRequestSchema = z.object({
  kind: z.literal('proofStep'),
  tactic: z.string(),
  proofState: id,
});

export const PickleEnvironmentRequestSchema = z.object({
  kind: z.literal('pickleEnvironment'),
  env: id,
  pickleTo: z.string().min(1),
});

export const UnpickleEnvironmentRequestSchema = z.object({
  kind: z.literal('unpickleEnvironment'),
  unpickleEnvFrom: z.string().min(1),
});

export const PickleProofStateRequestSchema = z.object({
  kind: z.literal('pickleProofState'),
  proofState: id,
  pickleTo: z.string().min(1),
});

export const UnpickleProofStateRequestSchema = z.object({
  kind: z.literal('unpickleProofState'),
  unpickleProofStateFrom: z.string().min(1),
  env: id.optional(),
});

export const ReplRequestSchema = z.discriminatedUnion('kind', [
  CommandRequestSchema,
  FileCommandRequestSchema,
  ProofStepRequestSchema,
  PickleEnvironmentRequestSchema,
  UnpickleEnvironmentRequestSchema,
  PickleProofStateRequestSchema,
  UnpickleProofStateRequestSchema,
]);

export type CommandRequest = z.infer<typeof CommandRequestSchema>;
export type FileCommandRequest = z.infer<typeof FileCommandRequestSchema>;
export type ProofStepRequest = z.infer<typeof ProofStepRequestSchema>;
export type PickleEnvironmentRequest = z.infer<typeof PickleEnvironmentRequestSchema>;
export type UnpickleEnvironmentRequest = z.infer<typeof UnpickleEnvironmentRequestSchema>;
export type PickleProofStateRequest = z.infer<typeof PickleProofStateRequestSchema>;
export type UnpickleProofStateRequest = z.infer<typeof UnpickleProofStateRequestSchema>;
export type ReplRequest = z.infer<typeof ReplRequestSchema>;
export type RequestKind = ReplRequest['kind'];

/** Requests whose result can be pinned in the session cache. */
export type PinnableRequest =
  | CommandRequest
  | FileCommandRequest
  | ProofStepRequest
  | UnpickleEnvironmentRequest
  | UnpickleProofStateRequest;

/**
 * Flags that select optional response fields. `rootGoals` is not among them:
 * the REPL reports root goals as ordinary sorries, and only when asked.
 */
export interface RequestFlags {
  allTactics?: boolean;
  infotree?: string;
  declarations?: boolean;
}

export interface ParentRef {
  id: number;
  kind: StateKind;
}

/**
 * Validate an untrusted request, e.g. one line of a script.
 */
export function parseRequest(raw: unknown): ReplRequest {
  const result = ReplRequestSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : '';
    throw new InvalidRequestError(`Invalid request: ${issue ? `${field}: ${issue.message}` : 'unknown'}`, field);
  }
  return result.data;
}

export function isPinnable(request: ReplRequest): request is PinnableRequest {
  return request.kind !== 'pickleEnvironment' && request.kind !== 'pickleProofState';
}

/**
 * The kind of state a request's response mints.
 */
export function producedKind(request: ReplRequest): StateKind {
  switch (request.kind) {
    case 'proofStep':
    case 'pickleProofState':
    case 'unpickleProofState':
      return 'proofState';
    default:
      return 'env';
  }
}

/**
 * Ids the request depends on, in field order.
 */
export function parentRefs(request: ReplRequest): ParentRef[] {
  switch (request.kind) {
    case 'command':
    case 'fileCommand':
    case 'unpickleProofState':
      return request.env !== undefined ? [{ id: request.env, kind: 'env' }] : [];
    case 'pickleEnvironment':
      return [{ id: request.env, kind: 'env' }];
    case 'proofStep':
    case 'pickleProofState':
      return [{ id: request.proofState, kind: 'proofState' }];
    case 'unpickleEnvironment':
      return [];
  }
}

/**
 * Copy of the request with every parent id passed through `map`.
 */
export function mapParentIds(request: PinnableRequest, map: (ref: ParentRef) => number): PinnableRequest;
export function mapParentIds(request: ReplRequest, map: (ref: ParentRef) => number): ReplRequest;
export function mapParentIds(request: ReplRequest, map: (ref: ParentRef) => number): ReplRequest {
  switch (request.kind) {
    case 'command':
    case 'fileCommand':
    case 'unpickleProofState':
      return request.env === undefined ? { ...request } : { ...request, env: map({ id: request.env, kind: 'env' }) };
    case 'pickleEnvironment':
      return { ...request, env: map({ id: request.env, kind: 'env' }) };
    case 'proofStep':
    case 'pickleProofState':
      return { ...request, proofState: map({ id: request.proofState, kind: 'proofState' }) };
    case 'unpickleEnvironment':
      return { ...request };
  }
}

export function flagsOf(request: ReplRequest): RequestFlags {
  if (request.kind !== 'command' && request.kind !== 'fileCommand') return {};
  return {
    allTactics: request.allTactics,
    infotree: request.infotree,
    declarations: request.declarations,
  };
}

// ── Encoding ──

export interface EncodeDefaults {
  /** Engine options, overlaid by the request's own. */
  options: OptionMap;
  /** When false, commands are sent with `incrementality: false`. */
  incrementality: boolean;
}

/**
 * Split a dotted option name into segments, rejecting malformed names.
 */
export function optionNameSegments(name: string): string[] {
  const segments = name.split('.');
  if (segments.some((segment) => !NAME_SEGMENT.test(segment))) {
    throw new InvalidRequestError(`Invalid option name: "${name}"`, `options.${name}`);
  }
  return segments;
}

function encodeOptions(options: OptionMap): Array<[string[], boolean | number | string]> {
  return Object.entries(options).map(([name, option]): [string[], boolean | number | string] => [
    optionNameSegments(name),
    option.value,
  ]);
}

/**
 * Encode a request as the REPL's JSON object. Parent ids must already be the
 * live REPL's ids.
 */
export function encodeRequest(request: ReplRequest, defaults: EncodeDefaults): JsonObject {
  switch (request.kind) {
    case 'command':
    case 'fileCommand': {
      const { kind: _kind, options, ...fields } = request;
      const merged = { ...defaults.options, ...options };
      const payload: JsonObject = { ...fields };
      if (Object.keys(merged).length > 0) {
        payload.setOptions = encodeOptions(merged);
      }
      if (!defaults.incrementality) {
        payload.incrementality = false;
      }
      return dropUndefined(payload);
    }
    default: {
      const { kind: _kind, ...fields } = request;
      return dropUndefined({ ...fields });
    }
  }
}

function dropUndefined(payload: JsonObject): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(payload)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
