import { BalanceSheet } from '../domain/balanceSheet';

// Line maps are flat number records, so one level of spreading gives a fully independent copy.
export const cloneBalanceSheet = (bs: BalanceSheet): BalanceSheet => ({
  assets: { ...bs.assets },
  liabilities: { ...bs.liabilities },
  equity: { ...bs.equity },
});
