import { Store, MEMORY_STORE } from '../store.js';
import { pushSchema } from '../migrate.js';

/**
 * In-memory store with the full schema and the studio root context committed.
 */
export function createTestStore(): Store {
  const store = Store.open(MEMORY_STORE);
  pushSchema(store.db);
  return store;
}
