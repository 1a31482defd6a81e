import type { TradeExecution } from '../core/types.js';
import { countsTowardLimits, defaultModeFor, type ExecutionMode, type ExecutionStore } from './executionStore.js';

interface StoredExecution {
  record: TradeExecution;
  counted: boolean;
}

export class InMemoryExecutionStore implements ExecutionStore {
  private readonly entries: StoredExecution[] = [];

  async saveExecution(record: TradeExecution, mode: ExecutionMode = defaultModeFor(record)): Promise<void> {
    this.entries.push({ record, counted: countsTowardLimits(record, mode) });
  }

  async countLiveTradesSince(sinceMs: number): Promise<number> {
    return this.entries.filter((e) => e.counted && Date.parse(e.record.timestamp) >= sinceMs).length;
  }

  async getRecentExecutions(limit: number): Promise<TradeExecution[]> {
    return this.entries
      .map((e) => e.record)
      .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp))
      .slice(0, limit);
  }
}
