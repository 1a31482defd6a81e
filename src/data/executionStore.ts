import type { TradeExecution } from '../core/types.js';

/** Whether the request behind a record asked for a dry run or a live trade. */
export type ExecutionMode = 'live' | 'dry_run';

export const defaultModeFor = (record: TradeExecution): ExecutionMode =>
  record.status === 'dry_run' ? 'dry_run' : 'live';

/**
 * Live attempts that got past validation and the risk gate. Only these
 * consume the daily and hourly trade quota.
 */
export const countsTowardLimits = (record: TradeExecution, mode: ExecutionMode): boolean => {
  if (mode !== 'live' || record.status === 'dry_run') return false;
  return !(record.status === 'failed' && (record.failureKind === 'validation' || record.failureKind === 'risk_blocked'));
};

/** Durable log of terminal trade attempts. */
export interface ExecutionStore {
  /** `mode` defaults to `dry_run` for dry-run records and `live` for everything else. */
  saveExecution(record: TradeExecution, mode?: ExecutionMode): Promise<void>;
  /** Attempts at or after `sinceMs` (epoch ms) that count toward the trade limits. */
  countLiveTradesSince(sinceMs: number): Promise<number>;
  /** Newest first. */
  getRecentExecutions(limit: number): Promise<TradeExecution[]>;
}
