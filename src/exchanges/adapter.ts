import type { Quote } from '../core/types.js';

/** Price discovery and unsigned-transaction construction for one swap venue. */
export interface SwapAdapter {
  getQuote(inputMint: string, outputMint: string, amount: bigint, slippageBps: number): Promise<Quote>;
  /** Returns the serialized, unsigned transaction. Never signs. */
  buildSwapTransaction(quote: Quote, walletPublicKey: string): Promise<Uint8Array>;
}
