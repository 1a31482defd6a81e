import type {
  DryRunExecution,
  FailedExecution,
  FailureKind,
  SuccessfulExecution,
  TradeAction
} from '../core/types.js';

/** Fields fixed when an attempt starts; every record of that attempt carries them. */
export interface AttemptContext {
  timestamp: string;
  signal: string;
  inputToken: string;
  outputToken: string;
  inputAmount: number;
  slippageBps: number;
}

interface Outcome {
  executionDurationSec: number;
  expectedOutput?: number;
  feePaidSol?: number;
}

// Optional fields stay absent rather than undefined so records compare and serialize cleanly.
const optionalFields = (outcome: Outcome): Pick<Outcome, 'expectedOutput' | 'feePaidSol'> => ({
  ...(outcome.expectedOutput !== undefined ? { expectedOutput: outcome.expectedOutput } : {}),
  ...(outcome.feePaidSol !== undefined ? { feePaidSol: outcome.feePaidSol } : {})
});

export const failedRecord = (
  ctx: AttemptContext,
  failureKind: FailureKind,
  errorMessage: string,
  outcome: Outcome
): Readonly<FailedExecution> => {
  const record: FailedExecution = {
    ...ctx,
    executionDurationSec: outcome.executionDurationSec,
    ...optionalFields(outcome),
    status: 'failed',
    failureKind,
    errorMessage
  };
  return Object.freeze(record);
};

export const dryRunRecord = (
  ctx: AttemptContext,
  signal: TradeAction,
  expectedOutput: number,
  executionDurationSec: number
): Readonly<DryRunExecution> => {
  const record: DryRunExecution = {
    ...ctx,
    signal,
    executionDurationSec,
    status: 'dry_run',
    expectedOutput
  };
  return Object.freeze(record);
};

export const successRecord = (
  ctx: AttemptContext,
  signal: TradeAction,
  transactionSignature: string,
  outputAmount: number,
  outcome: Outcome
): Readonly<SuccessfulExecution> => {
  const record: SuccessfulExecution = {
    ...ctx,
    signal,
    executionDurationSec: outcome.executionDurationSec,
    ...optionalFields(outcome),
    status: 'success',
    transactionSignature,
    outputAmount
  };
  return Object.freeze(record);
};
