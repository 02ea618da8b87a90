export {
  closeDb,
  createQueryAdapter,
  db,
  dbHealthcheck,
  getSql,
  normalizeQueryParams,
  query,
  type QueryResult,
  type Queryable
} from './client.js';
export { loadDbConfig, type DbConfig } from './pool-config.js';
export * as schema from './schema/index.js';
