/**
 * Decimal <-> smallest-unit conversion (SOL <-> lamports, USDT <-> micro-USDT).
 * Goes through toFixed so that 0.01 SOL becomes exactly 10_000_000n.
 */
export const toSmallestUnits = (amount: number, decimals: number): bigint => {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new RangeError(`amount must be a finite non-negative number, got ${amount}`);
  }
  const [whole = '0', frac = ''] = amount.toFixed(decimals).split('.');
  return BigInt(whole + frac);
};

export const fromSmallestUnits = (units: bigint, decimals: number): number => {
  return Number(units) / 10 ** decimals;
};
