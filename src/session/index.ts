import type { Logger } from '../logging/logger.js';
import type { SessionCacheStrategy } from '../config/schema.js';
import { SessionCache } from './session-cache.js';
import { ReplaySessionCache } from './replay-cache.js';
import { PickleSessionCache } from './pickle-cache.js';

export {
  SessionCache,
  sessionKeyFor,
  type SessionState,
  type StateSnapshot,
  type CacheContext,
  type ReplayContext,
  type ReplayOutcome,
  type SessionCacheOptions,
  type EvictionReason,
} from './session-cache.js';
export { ReplaySessionCache } from './replay-cache.js';
export { PickleSessionCache } from './pickle-cache.js';

export function createSessionCache(
  settings: { dir: string; strategy: SessionCacheStrategy; maxEntries?: number; maxAgeMs?: number },
  logger: Logger,
): SessionCache {
  const opts = { dir: settings.dir, logger, maxEntries: settings.maxEntries, maxAgeMs: settings.maxAgeMs };
  return settings.strategy === 'pickle' ? new PickleSessionCache(opts) : new ReplaySessionCache(opts);
}
