import { AssetCategory, LiabilityCategory, LiquidationLabel } from '../domain/enums';

export const LIQUIDATION_LABELS: Record<LiquidationLabel, AssetCategory> = {
  [LiquidationLabel.Cash]: AssetCategory.CashReserves,
  [LiquidationLabel.HqlaLevel1]: AssetCategory.HqlaLevel1,
  [LiquidationLabel.HqlaLevel2A]: AssetCategory.HqlaLevel2A,
  [LiquidationLabel.HqlaLevel2B]: AssetCategory.HqlaLevel2B,
  [LiquidationLabel.OtherSecurities]: AssetCategory.OtherSecurities,
  [LiquidationLabel.PerformingLoans]: AssetCategory.PerformingLoans,
  [LiquidationLabel.RealEstate]: AssetCategory.RealEstate,
};

// Base sale haircut in percent, before any fire-sale add-on.
export const BASE_LIQUIDATION_HAIRCUTS: Partial<Record<AssetCategory, number>> = {
  [AssetCategory.CashReserves]: 0,
  [AssetCategory.HqlaLevel1]: 0,
  [AssetCategory.HqlaLevel2A]: 5,
  [AssetCategory.HqlaLevel2B]: 15,
  [AssetCategory.OtherSecurities]: 25,
  [AssetCategory.PerformingLoans]: 30,
  [AssetCategory.RealEstate]: 40,
};

export const DEFAULT_BASE_HAIRCUT = 20;

export const FIRE_SALE_EXEMPT: ReadonlySet<AssetCategory> = new Set([
  AssetCategory.CashReserves,
  AssetCategory.HqlaLevel1,
]);

export const FIRE_SALE_MAX_DISCOUNT = 50;

// Run-off is applied in this order every period.
export const RUNOFF_CATEGORIES: readonly LiabilityCategory[] = [
  LiabilityCategory.RetailStable,
  LiabilityCategory.RetailUnstable,
  LiabilityCategory.CorporateDeposits,
  LiabilityCategory.WholesaleFunding,
  LiabilityCategory.SecuredFunding,
];

export const DEFAULT_LIQUIDATION_ORDER: readonly LiquidationLabel[] = [
  LiquidationLabel.Cash,
  LiquidationLabel.HqlaLevel1,
  LiquidationLabel.HqlaLevel2A,
  LiquidationLabel.HqlaLevel2B,
  LiquidationLabel.OtherSecurities,
  LiquidationLabel.PerformingLoans,
  LiquidationLabel.RealEstate,
];

const LABELS: ReadonlySet<string> = new Set(Object.values(LiquidationLabel));

export const isLiquidationLabel = (value: string): value is LiquidationLabel => LABELS.has(value);
