/**
 * Cache Infrastructure
 *
 * Process-wide memoization for resources that never change while the server
 * runs (database tables, the geographic reference).
 *
 * @example
 * ```typescript
 * import { createMemoCache, once } from '@/infra/cache/index.js';
 *
 * const tables = createMemoCache<DatasetId, LoadedTable>({
 *   shouldKeep: (loaded) => loaded.notice === undefined,
 * });
 * const table = await tables.get('map_user', () => loadFromDb('map_user'));
 *
 * const getGeo = once(() => geoRepo.load());
 * ```
 */

export { createMemoCache, once, type MemoCache, type MemoOptions } from './memo.js';
