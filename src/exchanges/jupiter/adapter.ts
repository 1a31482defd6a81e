import type { AxiosInstance } from 'axios';
import { QuoteUnavailableError, TransactionBuildError, describeError } from '../../core/errors.js';
import { getJson, postJson } from '../../core/http.js';
import type { Logger } from '../../core/logger.js';
import type { BackoffRetrier } from '../../core/retry.js';
import type { Quote } from '../../core/types.js';
import type { SwapAdapter } from '../adapter.js';
import { createJupiterClient } from './client.js';
import { jupiterEndpoints } from './endpoints.js';
import {
  jupiterQuoteSchema,
  jupiterSwapSchema,
  type JupiterSwapRequest
} from './types.js';

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

export interface JupiterAdapterOptions {
  baseUrl?: string;
  timeoutMs?: number;
  apiKey?: string;
}

export class JupiterSwapAdapter implements SwapAdapter {
  private readonly client: AxiosInstance;

  constructor(
    private readonly retrier: BackoffRetrier,
    private readonly logger: Logger,
    options: JupiterAdapterOptions = {}
  ) {
    this.client = createJupiterClient(options.baseUrl, options.timeoutMs, options.apiKey);
  }

  async getQuote(inputMint: string, outputMint: string, amount: bigint, slippageBps: number): Promise<Quote> {
    const params = {
      inputMint,
      outputMint,
      amount: amount.toString(),
      slippageBps: String(slippageBps)
    };

    try {
      return await this.retrier.execute(async () => {
        const body = await getJson<unknown>(this.client, jupiterEndpoints.quote(), params);
        const parsed = jupiterQuoteSchema.safeParse(body);
        if (!parsed.success || !isRecord(body)) {
          throw new QuoteUnavailableError('Malformed quote payload', {
            issues: parsed.success ? ['payload is not an object'] : parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
          });
        }

        const data = parsed.data;
        const quote: Quote = {
          inputMint,
          outputMint,
          inAmount: data.inAmount !== undefined ? BigInt(data.inAmount) : amount,
          outAmount: BigInt(data.outAmount),
          priceImpactPct: data.priceImpactPct ?? 0,
          slippageBps,
          raw: body
        };
        this.logger.info('jupiter quote fetched', {
          inputMint: inputMint.slice(0, 8),
          outputMint: outputMint.slice(0, 8),
          amount: quote.inAmount,
          outAmount: quote.outAmount,
          priceImpactPct: quote.priceImpactPct
        });
        return quote;
      }, 'jupiter.quote');
    } catch (err) {
      if (err instanceof QuoteUnavailableError) throw err;
      throw new QuoteUnavailableError(`Quote unavailable: ${describeError(err)}`, { inputMint, outputMint }, err);
    }
  }

  async buildSwapTransaction(quote: Quote, walletPublicKey: string): Promise<Uint8Array> {
    const payload: JupiterSwapRequest = {
      quoteResponse: quote.raw,
      userPublicKey: walletPublicKey,
      wrapAndUnwrapSol: true
    };

    try {
      return await this.retrier.execute(async () => {
        const body = await postJson<JupiterSwapRequest, unknown>(this.client, jupiterEndpoints.swap(), payload);
        const parsed = jupiterSwapSchema.safeParse(body);
        if (!parsed.success) {
          throw new TransactionBuildError('Swap response missing swapTransaction');
        }
        const txBytes = new Uint8Array(Buffer.from(parsed.data.swapTransaction, 'base64'));
        this.logger.info('jupiter swap transaction built', { txSize: txBytes.length });
        return txBytes;
      }, 'jupiter.swap');
    } catch (err) {
      if (err instanceof TransactionBuildError) throw err;
      throw new TransactionBuildError(`Swap build failed: ${describeError(err)}`, { userPublicKey: walletPublicKey }, err);
    }
  }
}
