export interface Wallet {
  /** Base58 address. */
  getPublicKey(): string;
  /** Adds this wallet's signature to a serialized transaction and returns the new bytes. */
  sign(rawTransaction: Uint8Array): Promise<Uint8Array>;
}
