import { Keypair, VersionedTransaction } from '@solana/web3.js';
import bs58 from 'bs58';
import { WalletError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Wallet } from './interface.js';

const SECRET_KEY_LENGTH = 64;

/**
 * Accepts the two formats wallets export: a base58 string, or the
 * JSON byte array written by `solana-keygen`.
 */
export const decodeSecretKey = (secret: string): Uint8Array => {
  const trimmed = secret.trim();
  if (trimmed === '') throw new WalletError('Wallet private key cannot be empty');

  let bytes: Uint8Array;
  if (trimmed.startsWith('[')) {
    let values: unknown;
    try {
      values = JSON.parse(trimmed);
    } catch (err) {
      throw new WalletError('Wallet private key is not a valid JSON byte array', undefined, err);
    }
    if (!Array.isArray(values) || !values.every((v) => Number.isInteger(v) && v >= 0 && v <= 255)) {
      throw new WalletError('Wallet private key is not a valid JSON byte array');
    }
    bytes = Uint8Array.from(values);
  } else {
    try {
      bytes = bs58.decode(trimmed);
    } catch (err) {
      throw new WalletError('Wallet private key is not valid base58', undefined, err);
    }
  }

  if (bytes.length !== SECRET_KEY_LENGTH) {
    throw new WalletError(`Wallet private key must decode to ${SECRET_KEY_LENGTH} bytes, got ${bytes.length}`);
  }
  return bytes;
};

export class KeypairWallet implements Wallet {
  constructor(private readonly keypair: Keypair) {}

  static fromSecret(secret: string, logger?: Logger): KeypairWallet {
    let keypair: Keypair;
    try {
      keypair = Keypair.fromSecretKey(decodeSecretKey(secret));
    } catch (err) {
      if (err instanceof WalletError) throw err;
      throw new WalletError('Invalid wallet private key', undefined, err);
    }
    const wallet = new KeypairWallet(keypair);
    logger?.info('wallet initialized', { walletAddress: wallet.getPublicKey() });
    return wallet;
  }

  getPublicKey(): string {
    return this.keypair.publicKey.toBase58();
  }

  async sign(rawTransaction: Uint8Array): Promise<Uint8Array> {
    try {
      const tx = VersionedTransaction.deserialize(rawTransaction);
      tx.sign([this.keypair]);
      return tx.serialize();
    } catch (err) {
      throw new WalletError(
        `Failed to sign transaction: ${err instanceof Error ? err.message : String(err)}`,
        { walletAddress: this.getPublicKey() },
        err
      );
    }
  }
}
