// QuestDB table shapes

import { OptionSnapshotRow, SnapshotPassSummary } from '@optiontape/shared';

export interface QuestDBColumn {
  name: string;
  type: string;
}

export interface QuestDBResult {
  query?: string;
  columns: QuestDBColumn[];
  dataset: unknown[][];
  count?: number;
}

export interface SnapshotPassRecord {
  summary: SnapshotPassSummary;
  rows: OptionSnapshotRow[];
  completedAt: Date;
}
