import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { FAILURE_KINDS, TRADE_ACTIONS, type TradeExecution } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { countsTowardLimits, defaultModeFor, type ExecutionMode, type ExecutionStore } from './executionStore.js';

const actionSchema = z.enum(TRADE_ACTIONS);

const rowSchema = z.object({
  timestamp: z.string(),
  signal: z.string(),
  inputToken: z.string(),
  outputToken: z.string(),
  inputAmount: z.number(),
  expectedOutput: z.number().nullable(),
  outputAmount: z.number().nullable(),
  slippageBps: z.number(),
  transactionSignature: z.string().nullable(),
  status: z.string(),
  failureKind: z.enum(FAILURE_KINDS).nullable(),
  errorMessage: z.string().nullable(),
  feePaidSol: z.number().nullable(),
  executionDurationSec: z.number()
});

type ExecutionRow = z.infer<typeof rowSchema>;

const toExecution = (row: ExecutionRow): TradeExecution | null => {
  const base = {
    timestamp: row.timestamp,
    signal: row.signal,
    inputToken: row.inputToken,
    outputToken: row.outputToken,
    inputAmount: row.inputAmount,
    slippageBps: row.slippageBps,
    executionDurationSec: row.executionDurationSec,
    ...(row.expectedOutput !== null ? { expectedOutput: row.expectedOutput } : {}),
    ...(row.feePaidSol !== null ? { feePaidSol: row.feePaidSol } : {})
  };
  const signal = actionSchema.safeParse(row.signal);

  switch (row.status) {
    case 'success':
      if (!signal.success || row.transactionSignature === null || row.outputAmount === null) return null;
      return {
        ...base,
        status: 'success',
        signal: signal.data,
        transactionSignature: row.transactionSignature,
        outputAmount: row.outputAmount
      };
    case 'dry_run':
      if (!signal.success || row.expectedOutput === null) return null;
      return { ...base, status: 'dry_run', signal: signal.data, expectedOutput: row.expectedOutput };
    case 'failed':
      return {
        ...base,
        status: 'failed',
        failureKind: row.failureKind ?? 'unexpected',
        errorMessage: row.errorMessage ?? ''
      };
    default:
      return null;
  }
};

/**
 * SQLite-backed trade log. One row per terminal attempt; the risk gate
 * reads its counts from here on every check.
 */
export class SqliteExecutionStore implements ExecutionStore {
  private readonly db: Database.Database;

  constructor(dbPath = './data/trading.sqlite', private readonly logger?: Logger) {
    if (dbPath !== ':memory:') fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.init();
  }

  /** Exposed so the circuit breaker can keep its state in the same file. */
  get database(): Database.Database {
    return this.db;
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS trade_executions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        timestamp_ms INTEGER NOT NULL,
        signal TEXT NOT NULL,
        input_token TEXT NOT NULL,
        output_token TEXT NOT NULL,
        input_amount REAL NOT NULL,
        expected_output REAL,
        output_amount REAL,
        slippage_bps INTEGER NOT NULL,
        transaction_signature TEXT,
        status TEXT NOT NULL CHECK (status IN ('pending', 'success', 'failed', 'dry_run')),
        failure_kind TEXT,
        error_message TEXT,
        fee_paid_sol REAL,
        execution_duration_sec REAL NOT NULL,
        mode TEXT NOT NULL DEFAULT 'live' CHECK (mode IN ('live', 'dry_run')),
        counts_toward_limits INTEGER NOT NULL DEFAULT 0 CHECK (counts_toward_limits IN (0, 1))
      );

      CREATE INDEX IF NOT EXISTS idx_trade_executions_counted_time
        ON trade_executions(counts_toward_limits, timestamp_ms);
    `);
  }

  async saveExecution(record: TradeExecution, mode: ExecutionMode = defaultModeFor(record)): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO trade_executions(
        timestamp, timestamp_ms, signal, input_token, output_token, input_amount,
        expected_output, output_amount, slippage_bps, transaction_signature, status,
        failure_kind, error_message, fee_paid_sol, execution_duration_sec, mode, counts_toward_limits
      ) VALUES(
        @timestamp, @timestampMs, @signal, @inputToken, @outputToken, @inputAmount,
        @expectedOutput, @outputAmount, @slippageBps, @transactionSignature, @status,
        @failureKind, @errorMessage, @feePaidSol, @executionDurationSec, @mode, @countsTowardLimits
      )
    `);
    // Every named parameter must be bound, so absent fields go in as null.
    stmt.run({
      timestamp: record.timestamp,
      timestampMs: Date.parse(record.timestamp),
      signal: record.signal,
      inputToken: record.inputToken,
      outputToken: record.outputToken,
      inputAmount: record.inputAmount,
      expectedOutput: record.expectedOutput ?? null,
      outputAmount: record.status === 'success' ? record.outputAmount : null,
      slippageBps: record.slippageBps,
      transactionSignature: record.status === 'success' ? record.transactionSignature : null,
      status: record.status,
      failureKind: record.status === 'failed' ? record.failureKind : null,
      errorMessage: record.status === 'failed' ? record.errorMessage : null,
      feePaidSol: record.feePaidSol ?? null,
      executionDurationSec: record.executionDurationSec,
      mode,
      countsTowardLimits: countsTowardLimits(record, mode) ? 1 : 0
    });
  }

  async countLiveTradesSince(sinceMs: number): Promise<number> {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS count
         FROM trade_executions
         WHERE counts_toward_limits = 1 AND timestamp_ms >= ?`
      )
      .get(sinceMs);
    return z.object({ count: z.number() }).parse(row).count;
  }

  async getRecentExecutions(limit: number): Promise<TradeExecution[]> {
    const rows = this.db
      .prepare(
        `SELECT
          timestamp,
          signal,
          input_token AS inputToken,
          output_token AS outputToken,
          input_amount AS inputAmount,
          expected_output AS expectedOutput,
          output_amount AS outputAmount,
          slippage_bps AS slippageBps,
          transaction_signature AS transactionSignature,
          status,
          failure_kind AS failureKind,
          error_message AS errorMessage,
          fee_paid_sol AS feePaidSol,
          execution_duration_sec AS executionDurationSec
        FROM trade_executions
        ORDER BY timestamp_ms DESC, id DESC
        LIMIT ?`
      )
      .all(limit);

    const executions: TradeExecution[] = [];
    for (const raw of rows) {
      const parsed = rowSchema.safeParse(raw);
      const execution = parsed.success ? toExecution(parsed.data) : null;
      if (execution) {
        executions.push(execution);
      } else {
        this.logger?.warn('skipping unreadable trade_executions row', { row: raw });
      }
    }
    return executions;
  }

  close(): void {
    this.db.close();
  }
}
