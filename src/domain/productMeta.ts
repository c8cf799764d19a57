import { AssetCategory, EquityCategory, LedgerSection, LiabilityCategory, LineItemKey } from './enums';

export interface LineItemMetadata<K extends LineItemKey = LineItemKey> {
  key: K;
  label: string;
  section: LedgerSection;
  // Counted in total deposits and the loan-to-deposit ratio.
  isDeposit?: boolean;
}

export const ASSET_META: Record<AssetCategory, LineItemMetadata<AssetCategory>> = {
  [AssetCategory.CashReserves]: {
    key: AssetCategory.CashReserves,
    label: 'Cash & central bank reserves',
    section: LedgerSection.Assets,
  },
  [AssetCategory.HqlaLevel1]: {
    key: AssetCategory.HqlaLevel1,
    label: 'HQLA Level 1',
    section: LedgerSection.Assets,
  },
  [AssetCategory.HqlaLevel2A]: {
    key: AssetCategory.HqlaLevel2A,
    label: 'HQLA Level 2A',
    section: LedgerSection.Assets,
  },
  [AssetCategory.HqlaLevel2B]: {
    key: AssetCategory.HqlaLevel2B,
    label: 'HQLA Level 2B',
    section: LedgerSection.Assets,
  },
  [AssetCategory.PerformingLoans]: {
    key: AssetCategory.PerformingLoans,
    label: 'Performing loans',
    section: LedgerSection.Assets,
  },
  [AssetCategory.Npl]: {
    key: AssetCategory.Npl,
    label: 'Non-performing loans',
    section: LedgerSection.Assets,
  },
  [AssetCategory.RealEstate]: {
    key: AssetCategory.RealEstate,
    label: 'Real estate / illiquid assets',
    section: LedgerSection.Assets,
  },
  [AssetCategory.OtherSecurities]: {
    key: AssetCategory.OtherSecurities,
    label: 'Other marketable securities',
    section: LedgerSection.Assets,
  },
  [AssetCategory.OtherAssets]: {
    key: AssetCategory.OtherAssets,
    label: 'Other assets',
    section: LedgerSection.Assets,
  },
};

export const LIABILITY_META: Record<LiabilityCategory, LineItemMetadata<LiabilityCategory>> = {
  [LiabilityCategory.RetailStable]: {
    key: LiabilityCategory.RetailStable,
    label: 'Stable retail deposits',
    section: LedgerSection.Liabilities,
    isDeposit: true,
  },
  [LiabilityCategory.RetailUnstable]: {
    key: LiabilityCategory.RetailUnstable,
    label: 'Less stable retail deposits',
    section: LedgerSection.Liabilities,
    isDeposit: true,
  },
  [LiabilityCategory.CorporateDeposits]: {
    key: LiabilityCategory.CorporateDeposits,
    label: 'Corporate deposits',
    section: LedgerSection.Liabilities,
    isDeposit: true,
  },
  [LiabilityCategory.WholesaleFunding]: {
    key: LiabilityCategory.WholesaleFunding,
    label: 'Wholesale funding',
    section: LedgerSection.Liabilities,
  },
  [LiabilityCategory.SecuredFunding]: {
    key: LiabilityCategory.SecuredFunding,
    label: 'Secured funding',
    section: LedgerSection.Liabilities,
  },
  [LiabilityCategory.OtherLiabilities]: {
    key: LiabilityCategory.OtherLiabilities,
    label: 'Other liabilities',
    section: LedgerSection.Liabilities,
  },
};

export const EQUITY_META: Record<EquityCategory, LineItemMetadata<EquityCategory>> = {
  [EquityCategory.Cet1]: { key: EquityCategory.Cet1, label: 'CET1', section: LedgerSection.Equity },
  [EquityCategory.At1]: { key: EquityCategory.At1, label: 'AT1', section: LedgerSection.Equity },
  [EquityCategory.Tier2]: { key: EquityCategory.Tier2, label: 'Tier 2', section: LedgerSection.Equity },
};
