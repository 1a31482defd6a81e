export interface SignatureStatus {
  /** True once the cluster reports `confirmed` or `finalized`. */
  confirmed: boolean;
  /** On-chain execution error, null when the transaction succeeded or is not yet final. */
  err: unknown;
}

export interface TransactionDetails {
  feeLamports?: number;
  /** Net change of `mint` held by `owner`, in smallest units. */
  balanceDelta?: bigint;
}

export interface BlockchainRpc {
  sendTransaction(signedTx: Uint8Array): Promise<string>;
  getSignatureStatus(signature: string): Promise<SignatureStatus>;
  /** Null while the transaction is not yet retrievable. */
  getTransactionDetails(signature: string, owner: string, mint: string): Promise<TransactionDetails | null>;
  /** Native balance in lamports. */
  getBalance(publicKey: string): Promise<number>;
  /** Total of `mint` held across the owner's token accounts, in smallest units. */
  getTokenBalance(owner: string, mint: string): Promise<bigint>;
}
