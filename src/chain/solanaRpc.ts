import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SOL_MINT } from '../config/schema.js';
import { RpcError, SubmissionError } from '../core/errors.js';
import { createHttpClient, postJson } from '../core/http.js';
import type { BlockchainRpc, SignatureStatus, TransactionDetails } from './rpc.js';

const SIGNATURE_PATTERN = /^[1-9A-HJ-NP-Za-km-z]{87,88}$/;

// Node-side conditions that clear up on their own (node behind, slot skipped, block not yet available).
const TRANSIENT_RPC_CODES = new Set([-32004, -32005, -32007, -32014]);

const rpcEnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.number(), z.string()]),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional()
    })
    .optional()
});

const signatureStatusesSchema = z.object({
  value: z.array(
    z
      .object({
        err: z.unknown().nullable(),
        confirmationStatus: z.enum(['processed', 'confirmed', 'finalized']).nullable().optional()
      })
      .nullable()
  )
});

const tokenBalanceSchema = z.object({
  mint: z.string(),
  owner: z.string().optional(),
  uiTokenAmount: z.object({ amount: z.string().regex(/^\d+$/) })
});

const transactionSchema = z
  .object({
    meta: z
      .object({
        fee: z.number(),
        preBalances: z.array(z.number()),
        postBalances: z.array(z.number()),
        preTokenBalances: z.array(tokenBalanceSchema).nullable().optional(),
        postTokenBalances: z.array(tokenBalanceSchema).nullable().optional()
      })
      .nullable(),
    transaction: z.object({
      message: z.object({
        accountKeys: z.array(z.union([z.string(), z.object({ pubkey: z.string() })]))
      })
    })
  })
  .nullable();

const balanceSchema = z.object({ value: z.number() });

const tokenAccountsSchema = z.object({
  value: z.array(
    z.object({
      account: z.object({
        data: z.object({
          parsed: z.object({
            info: z.object({ tokenAmount: z.object({ amount: z.string().regex(/^\d+$/) }) })
          })
        })
      })
    })
  )
});

type TokenBalance = z.infer<typeof tokenBalanceSchema>;

const sumHeld = (balances: TokenBalance[] | null | undefined, owner: string, mint: string): bigint =>
  (balances ?? [])
    .filter((b) => b.mint === mint && b.owner === owner)
    .reduce((acc, b) => acc + BigInt(b.uiTokenAmount.amount), 0n);

/** Minimal Solana JSON-RPC client over the shared axios stack. */
export class SolanaRpcClient implements BlockchainRpc {
  private readonly client: AxiosInstance;
  private nextId = 1;

  constructor(rpcUrl: string, timeoutMs = 10000) {
    this.client = createHttpClient(rpcUrl, timeoutMs, { 'content-type': 'application/json' });
  }

  private async call<T>(method: string, params: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body = await postJson<unknown, unknown>(this.client, '', {
      jsonrpc: '2.0',
      id: this.nextId++,
      method,
      params
    });

    const envelope = rpcEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new RpcError(`Malformed JSON-RPC response to ${method}`, { method });
    }
    const { error, result } = envelope.data;
    if (error) {
      throw new RpcError(
        `${method} failed: ${error.message}`,
        { method, rpcCode: error.code, data: error.data },
        { transient: TRANSIENT_RPC_CODES.has(error.code) }
      );
    }

    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new RpcError(`Unexpected ${method} result shape`, {
        method,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      });
    }
    return parsed.data;
  }

  async sendTransaction(signedTx: Uint8Array): Promise<string> {
    let signature: string;
    try {
      signature = await this.call(
        'sendTransaction',
        [
          Buffer.from(signedTx).toString('base64'),
          { encoding: 'base64', skipPreflight: false, preflightCommitment: 'confirmed' }
        ],
        z.string()
      );
    } catch (err) {
      // Preflight rejections are deterministic; anything transient is left for the retrier.
      if (err instanceof RpcError && !err.transient) {
        throw new SubmissionError(err.message, err.details, err);
      }
      throw err;
    }

    if (!SIGNATURE_PATTERN.test(signature)) {
      throw new SubmissionError(`RPC returned an invalid signature: ${signature}`);
    }
    return signature;
  }

  async getSignatureStatus(signature: string): Promise<SignatureStatus> {
    const result = await this.call(
      'getSignatureStatuses',
      [[signature], { searchTransactionHistory: false }],
      signatureStatusesSchema
    );
    const status = result.value[0];
    if (!status) return { confirmed: false, err: null };

    const confirmed = status.confirmationStatus === 'confirmed' || status.confirmationStatus === 'finalized';
    return { confirmed, err: status.err ?? null };
  }

  async getTransactionDetails(signature: string, owner: string, mint: string): Promise<TransactionDetails | null> {
    const tx = await this.call(
      'getTransaction',
      [signature, { encoding: 'jsonParsed', commitment: 'confirmed', maxSupportedTransactionVersion: 0 }],
      transactionSchema
    );
    if (!tx?.meta) return null;

    const { meta } = tx;
    const details: TransactionDetails = { feeLamports: meta.fee };

    if (mint === SOL_MINT) {
      // wrapAndUnwrapSol settles native SOL straight into the owner account.
      const keys = tx.transaction.message.accountKeys.map((k) => (typeof k === 'string' ? k : k.pubkey));
      const idx = keys.indexOf(owner);
      const pre = meta.preBalances[idx];
      const post = meta.postBalances[idx];
      if (idx >= 0 && pre !== undefined && post !== undefined) {
        // The fee payer (index 0) also paid the fee out of that balance.
        const delta = post - pre + (idx === 0 ? meta.fee : 0);
        details.balanceDelta = BigInt(delta);
      }
    } else {
      details.balanceDelta = sumHeld(meta.postTokenBalances, owner, mint) - sumHeld(meta.preTokenBalances, owner, mint);
    }
    return details;
  }

  async getBalance(publicKey: string): Promise<number> {
    const result = await this.call('getBalance', [publicKey, { commitment: 'confirmed' }], balanceSchema);
    return result.value;
  }

  async getTokenBalance(owner: string, mint: string): Promise<bigint> {
    const result = await this.call(
      'getTokenAccountsByOwner',
      [owner, { mint }, { encoding: 'jsonParsed', commitment: 'confirmed' }],
      tokenAccountsSchema
    );
    return result.value.reduce((acc, a) => acc + BigInt(a.account.data.parsed.info.tokenAmount.amount), 0n);
  }
}
