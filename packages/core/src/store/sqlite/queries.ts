/**
 * SQL statements used by SQLiteScanStore
 */

const UPSERT_SET = `
  domain = excluded.domain,
  word_count = excluded.word_count,
  stylistic_index = excluded.stylistic_index,
  label = excluded.label,
  title = COALESCE(excluded.title, scans.title),
  published_date = COALESCE(excluded.published_date, scans.published_date),
  scanned_at = excluded.scanned_at
`;

export const QUERIES = {
  // Scans
  upsertUrlScan: `
    INSERT INTO scans (url, file_path, domain, word_count, stylistic_index, label, title, published_date, scanned_at)
    VALUES (?, NULL, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(url) DO UPDATE SET ${UPSERT_SET}
  `,
  upsertFileScan: `
    INSERT INTO scans (url, file_path, domain, word_count, stylistic_index, label, title, published_date, scanned_at)
    VALUES (NULL, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(file_path) DO UPDATE SET ${UPSERT_SET}
  `,
  scanIdByUrl: `SELECT id FROM scans WHERE url = ?`,
  scanIdByFile: `SELECT id FROM scans WHERE file_path = ?`,
  scanByUrl: `SELECT * FROM scans WHERE url = ?`,
  scanByFile: `SELECT * FROM scans WHERE file_path = ?`,
  scanById: `SELECT * FROM scans WHERE id = ?`,
  updateScanScore: `UPDATE scans SET stylistic_index = ?, label = ? WHERE id = ?`,
  deleteScan: `DELETE FROM scans WHERE id = ?`,
  countScans: `SELECT COUNT(*) AS count FROM scans`,

  // Pattern scores
  deletePatternScores: `DELETE FROM pattern_scores WHERE scan_id = ?`,
  insertPatternScore: `
    INSERT INTO pattern_scores (scan_id, pattern_id, category, raw_value, normalized_score, pattern_version)
    VALUES (?, ?, ?, ?, ?, ?)
  `,
  patternScoresForScan: `
    SELECT * FROM pattern_scores WHERE scan_id = ? ORDER BY pattern_id
  `,

  // Staleness: a scan is stale when it lacks a row for a current pattern, or
  // holds one computed at an older version. The current versions arrive as a
  // JSON object {pattern_id: version}.
  staleScans: `
    SELECT s.id, s.url, s.file_path
    FROM scans s
    WHERE (? IS NULL OR s.domain = ?)
      AND EXISTS (
        SELECT 1
        FROM json_each(?) AS v
        LEFT JOIN pattern_scores ps
          ON ps.scan_id = s.id AND ps.pattern_id = v.key
        WHERE ps.pattern_id IS NULL OR ps.pattern_version < v.value
      )
    ORDER BY s.id
  `,

  // Reports
  domainStats: `
    SELECT
      COUNT(*) AS scans,
      AVG(stylistic_index) AS mean_index,
      MIN(stylistic_index) AS min_index,
      MAX(stylistic_index) AS max_index,
      MAX(scanned_at) AS latest_scanned_at,
      SUM(CASE WHEN label = 'LIKELY_HUMAN' THEN 1 ELSE 0 END) AS likely_human,
      SUM(CASE WHEN label = 'UNCERTAIN' THEN 1 ELSE 0 END) AS uncertain,
      SUM(CASE WHEN label = 'LIKELY_AI' THEN 1 ELSE 0 END) AS likely_ai
    FROM scans
    WHERE domain = ?
  `,
  patternVersionSummary: `
    SELECT pattern_id, pattern_version, COUNT(*) AS scans
    FROM pattern_scores
    GROUP BY pattern_id, pattern_version
    ORDER BY pattern_id, pattern_version
  `,
  countBelowIndex: `SELECT COUNT(*) AS count FROM scans WHERE stylistic_index < ?`,
  leaderboard: `
    SELECT * FROM scans
    WHERE (? IS NULL OR label = ?)
    ORDER BY stylistic_index DESC, id ASC
    LIMIT ?
  `,
} as const;
