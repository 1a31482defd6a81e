import type Database from 'better-sqlite3';
import { z } from 'zod';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';

export interface CircuitBreakerConfig {
  /** Trip when the observed price moves more than this percentage between observations. */
  priceChangePct: number;
}

export interface CircuitBreakerState {
  tripped: boolean;
  reason: string | null;
  trippedAt: number | null;
  lastPrice: number | null;
}

const persistedRowSchema = z.object({
  tripped: z.number(),
  reason: z.string().nullable(),
  tripped_at: z.number().nullable(),
  last_price: z.number().nullable()
});

/**
 * Process-wide switch that blocks every live trade until reset.
 * Trips manually or when the quote-implied price jumps. With `init(db)`
 * the state survives restarts and needs a manual reset.
 */
export class CircuitBreaker {
  private state: CircuitBreakerState = {
    tripped: false,
    reason: null,
    trippedAt: null,
    lastPrice: null
  };

  private db?: Database.Database;

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly logger: Logger,
    private readonly metrics: Metrics,
    private readonly now: () => number = Date.now
  ) {
    if (!(config.priceChangePct > 0)) {
      throw new RangeError(`priceChangePct must be > 0, got ${config.priceChangePct}`);
    }
  }

  /** Create the state table and hydrate from it. */
  init(db: Database.Database): void {
    this.db = db;
    db.exec(`
      CREATE TABLE IF NOT EXISTS circuit_breaker (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        tripped INTEGER NOT NULL DEFAULT 0,
        reason TEXT,
        tripped_at INTEGER,
        last_price REAL
      )
    `);
    const row = persistedRowSchema.optional().parse(
      db.prepare('SELECT tripped, reason, tripped_at, last_price FROM circuit_breaker WHERE id = 1').get()
    );
    if (row) {
      this.state = {
        tripped: row.tripped === 1,
        reason: row.reason,
        trippedAt: row.tripped_at,
        lastPrice: row.last_price
      };
    } else {
      db.prepare('INSERT INTO circuit_breaker (id, tripped) VALUES (1, 0)').run();
      this.persist();
    }
    if (this.state.tripped) {
      this.logger.warn('circuit breaker is active from previous session', { reason: this.state.reason });
    }
  }

  isTripped(): boolean {
    return this.state.tripped;
  }

  trip(reason: string): void {
    if (this.state.tripped) return;
    this.state.tripped = true;
    this.state.reason = reason;
    this.state.trippedAt = this.now();
    this.logger.error('CIRCUIT BREAKER TRIPPED', { reason });
    this.metrics.increment('circuit_breaker.tripped');
    this.persist();
  }

  reset(): void {
    this.state.tripped = false;
    this.state.reason = null;
    this.state.trippedAt = null;
    this.logger.info('circuit breaker reset');
    this.metrics.increment('circuit_breaker.reset');
    this.persist();
  }

  getState(): Readonly<CircuitBreakerState> {
    return { ...this.state };
  }

  /** Feed the latest quote-implied price of the base asset. */
  observePrice(price: number): void {
    if (!Number.isFinite(price) || price <= 0) return;
    const previous = this.state.lastPrice;
    this.state.lastPrice = price;

    if (previous !== null) {
      const changePct = (Math.abs(price - previous) / previous) * 100;
      if (changePct > this.config.priceChangePct) {
        this.trip(
          `Price moved ${changePct.toFixed(2)}% (${previous} -> ${price}), threshold ${this.config.priceChangePct}%`
        );
        return;
      }
    }
    this.persist();
  }

  private persist(): void {
    this.db
      ?.prepare('UPDATE circuit_breaker SET tripped = ?, reason = ?, tripped_at = ?, last_price = ? WHERE id = 1')
      .run(this.state.tripped ? 1 : 0, this.state.reason, this.state.trippedAt, this.state.lastPrice);
  }
}
