import { AssetCategory, EquityCategory, LedgerSection, LiabilityCategory } from './enums';

export type AssetLines = Partial<Record<AssetCategory, number>>;
export type LiabilityLines = Partial<Record<LiabilityCategory, number>>;
export type EquityLines = Partial<Record<EquityCategory, number>>;

/**
 * Opening or working ledger. Amounts are currency units (millions in the dashboard).
 *
 * A line that is absent is different from a line at zero: mutations on an absent
 * line raise `UnknownCategoryError`, queries treat it as zero.
 */
export interface BalanceSheet {
  assets: AssetLines;
  liabilities: LiabilityLines;
  equity: EquityLines;
}

export interface LiquidationEvent {
  assetType: AssetCategory;
  amountLiquidated: number;
  haircutPct: number;
  proceeds: number;
  loss: number;
}

export interface BalanceSheetRow {
  section: LedgerSection | 'total';
  item: string;
  amount: number;
  // Share of total assets, in percent.
  sharePct: number;
}
