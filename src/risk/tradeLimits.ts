import type { Logger } from '../core/logger.js';
import type { RiskDecision } from '../core/types.js';
import type { ExecutionStore } from '../data/executionStore.js';
import type { CircuitBreaker } from './circuitBreaker.js';

const HOUR_MS = 60 * 60 * 1000;

export interface TradeLimitsConfig {
  maxTradesPerDay: number;
  maxTradesPerHour: number;
}

export interface RiskGate {
  checkLimits(): Promise<RiskDecision>;
}

export const startOfUtcDay = (nowMs: number): number => {
  const d = new Date(nowMs);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
};

/**
 * Pre-trade gate for live trades. Counts are read from the store on every
 * call; the first failing check wins: daily cap, hourly cap, circuit breaker.
 */
export class TradeLimitsGate implements RiskGate {
  constructor(
    private readonly config: TradeLimitsConfig,
    private readonly store: ExecutionStore,
    private readonly breaker: CircuitBreaker,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async checkLimits(): Promise<RiskDecision> {
    const nowMs = this.now();

    const daily = await this.store.countLiveTradesSince(startOfUtcDay(nowMs));
    if (daily >= this.config.maxTradesPerDay) {
      return this.block('daily_limit', `Daily trade limit reached (${daily}/${this.config.maxTradesPerDay})`);
    }

    const hourly = await this.store.countLiveTradesSince(nowMs - HOUR_MS);
    if (hourly >= this.config.maxTradesPerHour) {
      return this.block('hourly_limit', `Hourly trade limit reached (${hourly}/${this.config.maxTradesPerHour})`);
    }

    if (this.breaker.isTripped()) {
      const { reason } = this.breaker.getState();
      return this.block('circuit_breaker', reason ? `Circuit breaker active: ${reason}` : 'Circuit breaker active');
    }

    return { allowed: true };
  }

  private block(blockedBy: NonNullable<RiskDecision['blockedBy']>, reason: string): RiskDecision {
    this.logger.warn('trade blocked by risk gate', { blockedBy, reason });
    return { allowed: false, reason, blockedBy };
  }
}
