export { SQLiteClient } from './sqlite/client.js';
export type { SQLiteClientConfig } from './sqlite/client.js';
export { SQLiteScanStore } from './sqlite/sqlite-scan-store.js';
export { MIGRATIONS, SCHEMA, SCHEMA_VERSION } from './sqlite/schema.js';
export { WriteQueue } from './write-queue.js';
export { recomputeStoredScore } from './recompute.js';
export type {
  ScanStore,
  ScanFields,
  PatternScoreInput,
  StoredScan,
  StoredPatternScore,
  StaleScanQuery,
  DomainStats,
  PatternVersionCount,
  LeaderboardQuery,
} from './scan-store.js';
