/**
 * SQLite Schema Definition
 *
 * - scans: one row per target, keyed by exactly one of url / file_path
 * - pattern_scores: one row per (scan, pattern) from the latest evaluation
 */

export const SCHEMA = `
CREATE TABLE IF NOT EXISTS scans (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  url TEXT UNIQUE,
  file_path TEXT UNIQUE,
  domain TEXT NOT NULL DEFAULT '',
  word_count INTEGER NOT NULL DEFAULT 0 CHECK (word_count >= 0),
  stylistic_index INTEGER NOT NULL CHECK (stylistic_index BETWEEN 0 AND 100),
  label TEXT NOT NULL CHECK (label IN ('LIKELY_HUMAN', 'UNCERTAIN', 'LIKELY_AI')),
  title TEXT,
  published_date TEXT,
  scanned_at TEXT NOT NULL,
  CHECK ((url IS NULL) <> (file_path IS NULL))
);

CREATE TABLE IF NOT EXISTS pattern_scores (
  scan_id INTEGER NOT NULL REFERENCES scans(id) ON DELETE CASCADE,
  pattern_id TEXT NOT NULL,
  category TEXT NOT NULL,
  raw_value REAL NOT NULL,
  normalized_score REAL NOT NULL CHECK (normalized_score BETWEEN 0 AND 1),
  pattern_version INTEGER NOT NULL CHECK (pattern_version >= 1),
  PRIMARY KEY (scan_id, pattern_id)
);

CREATE INDEX IF NOT EXISTS idx_scans_domain ON scans(domain);
CREATE INDEX IF NOT EXISTS idx_scans_index ON scans(stylistic_index DESC);
CREATE INDEX IF NOT EXISTS idx_pattern_scores_pattern ON pattern_scores(pattern_id, pattern_version);
`;

/**
 * Schema version stored in PRAGMA user_version
 */
export const SCHEMA_VERSION = 2;

/**
 * Upgrades from version N - 1 to version N, keyed by N
 */
export const MIGRATIONS: Readonly<Record<number, string>> = {
  2: `ALTER TABLE scans ADD COLUMN title TEXT;`,
};
