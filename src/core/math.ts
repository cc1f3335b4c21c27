export const rateDifference = (rateA: number, rateB: number): number =>
  rateA - rateB;

export const expectedProfit = (amount: number, difference: number): number =>
  amount * Math.abs(difference);

export const formatDuration = (ms: number): string =>
  `${Math.max(0, Math.floor(ms))}ms`;
