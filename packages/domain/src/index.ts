export { Duration } from "./duration";
export { SettlementDay } from "./settlement-day";
export type { SettlementWindow } from "./settlement-day";
export {
  SETTLEMENT_PERIODS_PER_DAY,
  PREVIOUS_DAY_PERIODS,
  CURRENT_DAY_PERIODS,
  canonicalOrder,
  settlementPeriodRank,
  compareSettlementPeriods,
  sortBySettlementPeriod,
  isSettlementPeriod,
} from "./settlement-period";
export { Snapshot, normalizeSnapshot, recordKey } from "./snapshot";
export type { ImbalanceRecord, NormalizeOptions, RawImbalanceRecord, SnapshotJson } from "./snapshot";
export { diffSnapshots, selectDiffKeying, summarizeDiff, valueSign } from "./snapshot-diff";
export type {
  DiffKeying,
  DiffStatus,
  SnapshotDiff,
  SnapshotDiffRow,
  SnapshotDiffSummary,
  ValueSign,
} from "./snapshot-diff";
export {
  aggregateGeneration,
  compareGeneration,
  fuelForPsrType,
  selectLocalDayRecords,
  summarizeGenerationError,
} from "./generation-comparison";
export type {
  Fuel,
  GenerationComparisonRow,
  GenerationErrorSummary,
  RawGenerationRecord,
} from "./generation-comparison";
export * from "./errors";
export * from "./parsing";
