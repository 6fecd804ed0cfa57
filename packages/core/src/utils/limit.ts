import { PERSISTENCE_DEFAULTS, PERSISTENCE_LIMITS } from '../config/defaults';

export function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return PERSISTENCE_DEFAULTS.LIST_LIMIT;
  return Math.min(PERSISTENCE_LIMITS.MAX_LIST_LIMIT, Math.max(0, Math.floor(limit)));
}
