import type { RecordStore } from '../store/record-store.js';
import { NotFoundError } from '../errors.js';

export type LookupResult =
  | { id: string; found: true; payload: unknown }
  | { id: string; found: false; error: NotFoundError };

/**
 * Fetch the stored raw payload of each id, in request order. A miss is
 * reported in its own result and does not stop the remaining lookups.
 */
export function lookup(store: RecordStore, ids: readonly string[]): LookupResult[] {
  return ids.map((id) => {
    const payload = store.getRawById(id);
    return payload === undefined
      ? { id, found: false, error: new NotFoundError(id) }
      : { id, found: true, payload };
  });
}
