import { AssetCategory, EquityCategory, LiabilityCategory } from '../domain/enums';
import { BalanceSheetInput } from '../domain/schemas';

// Default figures for the manual-entry form, in millions. Assets exceed liabilities + equity by 300.
export const sampleBalanceSheet: BalanceSheetInput = {
  assets: {
    [AssetCategory.CashReserves]: 1000,
    [AssetCategory.HqlaLevel1]: 2000,
    [AssetCategory.HqlaLevel2A]: 500,
    [AssetCategory.HqlaLevel2B]: 300,
    [AssetCategory.PerformingLoans]: 15000,
    [AssetCategory.Npl]: 500,
    [AssetCategory.RealEstate]: 1000,
    [AssetCategory.OtherSecurities]: 800,
    [AssetCategory.OtherAssets]: 200,
  },
  liabilities: {
    [LiabilityCategory.RetailStable]: 8000,
    [LiabilityCategory.RetailUnstable]: 4000,
    [LiabilityCategory.CorporateDeposits]: 3000,
    [LiabilityCategory.WholesaleFunding]: 2000,
    [LiabilityCategory.SecuredFunding]: 1500,
    [LiabilityCategory.OtherLiabilities]: 500,
  },
  equity: {
    [EquityCategory.Cet1]: 1500,
    [EquityCategory.At1]: 200,
    [EquityCategory.Tier2]: 300,
  },
};
