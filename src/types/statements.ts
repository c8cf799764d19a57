export interface SeriesPoint {
  step: number;
  value: number;
}

/** One flattened period of a run, for tables and exports. */
export interface PeriodRow {
  period: number;
  totalOutflow: number;
  amountLiquidated: number;
  proceeds: number;
  losses: number;
  residualCashDrawn: number;
  closingCash: number;
  closingCet1: number;
  lcr: number;
  nsfr: number;
  cet1Ratio: number;
  totalCapitalRatio: number;
  liquidAssets: number;
  totalDeposits: number;
  creditMigration: number;
  creditProvision: number;
}
