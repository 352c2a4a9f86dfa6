import type { ErrorKind } from '../core/errors.js';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  VALIDATION: 400,
  CONFIG: 400,
  SOURCE_FETCH: 502,
  RESOLUTION_TIMEOUT: 504,
  RESOLUTION_FAILURE: 503,
  CAPACITY_EXCEEDED: 503,
  CIRCUIT_OPEN: 503,
  POOL_TIMEOUT: 503,
  NOT_READY: 503
};

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}
