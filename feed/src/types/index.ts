// ============================================================================
// FEED MODULE TYPES
// ============================================================================

export type {
  OptionSide,
  ParsedOptionSymbol,
  OptionTicker,
  UnderlyingPrices,
  OptionSnapshotRow,
  SnapshotPassSummary,
  AppError,
  ErrorType,
} from '@optiontape/shared';

export * from './binance';
export * from './database';
