const RAO_PER_TAO = 1_000_000_000n;
const RAO_PER_TAO_NUMBER = 1e9;

export const raoToTao = (rao: bigint): number =>
  Number(rao / RAO_PER_TAO) + Number(rao % RAO_PER_TAO) / RAO_PER_TAO_NUMBER;

export const taoToRao = (amountTao: number): bigint => {
  if (!Number.isFinite(amountTao) || amountTao < 0) {
    throw new Error(`Stake amount must be a non-negative finite number, got ${String(amountTao)}`);
  }

  return BigInt(Math.round(amountTao * RAO_PER_TAO_NUMBER));
};

export const parseRaoAmount = (rawValue: string): bigint => {
  const normalizedValue: string = rawValue.trim().replace(/,/g, '');

  if (!/^\d+$/.test(normalizedValue)) {
    throw new Error(`Unexpected ledger amount: ${rawValue}`);
  }

  return BigInt(normalizedValue);
};
