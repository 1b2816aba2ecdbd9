import { randomUUID } from 'crypto';
import { OptionSnapshotRow } from '@optiontape/shared';
import { config } from '../config';
import { QuestDBResult, SnapshotPassRecord } from '../types/database';
import { QueryParam, QuestDBConnection } from './connection';
import { getTableName, OPTION_SNAPSHOTS_TABLE, SNAPSHOT_PASSES_TABLE } from './tables';

/**
 * Durable home of snapshot rows and the snapshot index high-water mark
 */
export interface SnapshotStore {
  initialize(): Promise<void>;
  getMaxSnapshotIndex(): Promise<number>;
  recordPass(record: SnapshotPassRecord): Promise<void>;
}

type Queryable = Pick<QuestDBConnection, 'query' | 'executeSchema'>;

/**
 * A pass write that failed part way. `rowsWritten` rows of the pass are already in option_snapshots.
 */
export class SnapshotWriteError extends Error {
  constructor(
    message: string,
    readonly rowsWritten: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SnapshotWriteError';
  }
}

// Column order for option_snapshots inserts
export const SNAPSHOT_COLUMNS = [
  'id',
  'snapshot_index',
  'timestamp',
  'symbol',
  'underlying',
  'expiration',
  'strike',
  'side',
  'underlying_price',
  'open_price',
  'high_price',
  'low_price',
  'last_price',
  'volume',
  'quote_volume',
  'trade_count',
  'bid_price',
  'ask_price',
  'bid_qty',
  'ask_qty',
  'bid_iv',
  'ask_iv',
  'delta',
  'theta',
  'gamma',
  'vega',
  'mark_iv',
  'mark_price',
] as const;

function rowValues(row: OptionSnapshotRow, id: string): QueryParam[] {
  return SNAPSHOT_COLUMNS.map(column => (column === 'id' ? id : row[column]));
}

/**
 * Read the first cell of a single-row aggregate query as a number, treating null as absent
 */
function readScalar(result: QuestDBResult): number | null {
  const cell = result.dataset[0]?.[0];
  if (cell === null || cell === undefined) {
    return null;
  }
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
}

export class QuestDBSnapshotStore implements SnapshotStore {
  constructor(
    private readonly connection: Queryable,
    private readonly insertBatchSize: number = config.questdb.insertBatchSize
  ) {}

  async initialize(): Promise<void> {
    await this.connection.executeSchema();
  }

  async getMaxSnapshotIndex(): Promise<number> {
    const fromRows = await this.connection.query(
      `SELECT max(snapshot_index) AS max_index FROM ${getTableName(OPTION_SNAPSHOTS_TABLE)}`
    );
    const fromPasses = await this.connection.query(
      `SELECT max(snapshot_index) AS max_index FROM ${getTableName(SNAPSHOT_PASSES_TABLE)}`
    );

    return Math.max(readScalar(fromRows) ?? 0, readScalar(fromPasses) ?? 0);
  }

  /**
   * Rows go in batches, then the pass row. A failure rejects with a SnapshotWriteError
   * carrying how many rows were already written.
   */
  async recordPass(record: SnapshotPassRecord): Promise<void> {
    const table = getTableName(OPTION_SNAPSHOTS_TABLE);
    let rowsWritten = 0;

    try {
      for (let start = 0; start < record.rows.length; start += this.insertBatchSize) {
        const batch = record.rows.slice(start, start + this.insertBatchSize);
        const params: QueryParam[] = [];
        const tuples = batch.map(row => {
          const offset = params.length;
          params.push(...rowValues(row, randomUUID()));
          return `(${SNAPSHOT_COLUMNS.map((_column, i) => `$${offset + i + 1}`).join(', ')})`;
        });

        await this.connection.query(
          `INSERT INTO ${table} (${SNAPSHOT_COLUMNS.join(', ')}) VALUES ${tuples.join(', ')}`,
          params
        );
        rowsWritten += batch.length;
      }

      await this.insertPassRow(record);
    } catch (error) {
      throw new SnapshotWriteError(error instanceof Error ? error.message : String(error), rowsWritten, {
        cause: error,
      });
    }
  }

  private async insertPassRow(record: SnapshotPassRecord): Promise<void> {
    const { summary } = record;
    await this.connection.query(
      `INSERT INTO ${getTableName(SNAPSHOT_PASSES_TABLE)} (snapshot_index, timestamp, collected, saved, dropped, unparsable, expired, illiquid)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        summary.snapshotIndex,
        record.completedAt,
        summary.collected,
        summary.saved,
        summary.dropped,
        summary.unparsable,
        summary.expired,
        summary.illiquid,
      ]
    );
  }
}
