export const OPTION_SNAPSHOTS_TABLE = 'option_snapshots';
export const SNAPSHOT_PASSES_TABLE = 'option_snapshot_passes';

export const ALL_TABLES = [OPTION_SNAPSHOTS_TABLE, SNAPSHOT_PASSES_TABLE];

/**
 * Get table name with test prefix if in test environment
 * Resilient to double prefixes - if already prefixed, returns as-is
 */
export function getTableName(originalTableName: string): string {
  if (process.env.NODE_ENV === 'test') {
    if (originalTableName.startsWith('test_')) {
      return originalTableName;
    }
    return `test_${originalTableName}`;
  }
  return originalTableName;
}
