import { AssetCategory, LiabilityCategory, TimeGranularity } from '../domain/enums';
import { BalanceTolerances, HqlaFactors, LcrParameters, NsfrParameters } from '../domain/config';
import { AlertThresholds, RiskLimits } from '../domain/risks';

export const HQLA_FACTORS: HqlaFactors = {
  level1: 1.0,
  level2A: 0.85,
  level2B: 0.5,
  level2Cap: 0.4,
};

export const LCR_PARAMETERS: LcrParameters = {
  outflowRates: {
    [LiabilityCategory.RetailStable]: 0.05,
    [LiabilityCategory.RetailUnstable]: 0.1,
    [LiabilityCategory.CorporateDeposits]: 0.4,
    [LiabilityCategory.WholesaleFunding]: 1.0,
    [LiabilityCategory.SecuredFunding]: 0.25,
  },
  loanMaturityInflowRate: 0.05,
  inflowCap: 0.75,
  netOutflowFloor: 0.25,
};

export const NSFR_PARAMETERS: NsfrParameters = {
  equityAsfFactor: 1.0,
  asfFactors: {
    [LiabilityCategory.RetailStable]: 0.95,
    [LiabilityCategory.RetailUnstable]: 0.9,
    [LiabilityCategory.CorporateDeposits]: 0.5,
  },
  rsfFactors: {
    [AssetCategory.HqlaLevel1]: 0.05,
    [AssetCategory.HqlaLevel2A]: 0.15,
    [AssetCategory.HqlaLevel2B]: 0.5,
    [AssetCategory.PerformingLoans]: 0.85,
    [AssetCategory.Npl]: 1.0,
    [AssetCategory.RealEstate]: 1.0,
    [AssetCategory.OtherSecurities]: 0.85,
    [AssetCategory.OtherAssets]: 0.85,
  },
};

// Cash and HQLA carry no risk weight.
export const RWA_WEIGHTS: Partial<Record<AssetCategory, number>> = {
  [AssetCategory.PerformingLoans]: 1.0,
  [AssetCategory.Npl]: 1.5,
  [AssetCategory.RealEstate]: 1.0,
  [AssetCategory.OtherSecurities]: 0.5,
  [AssetCategory.OtherAssets]: 1.0,
};

export const RISK_LIMITS: RiskLimits = {
  minLcr: 100,
  minNsfr: 100,
  minCet1Ratio: 4.5,
  minTier1Ratio: 6.0,
  minTotalCapitalRatio: 8.0,
};

export const ALERT_THRESHOLDS: AlertThresholds = {
  lcrWarning: 110,
  lcrCritical: 105,
  cet1Warning: 5.5,
  cet1Critical: 5.0,
};

export const BALANCE_TOLERANCES: BalanceTolerances = {
  warn: 0.01,
  fail: 1.0,
};

// Reported for LCR/NSFR when there is nothing to cover.
export const NO_EXPOSURE_RATIO = 999.9;

export const CREDIT_DETERIORATION_INTERVAL = 10;

export const PERIOD_DAYS: Record<TimeGranularity, number> = {
  [TimeGranularity.Daily]: 1,
  [TimeGranularity.Monthly]: 30,
  [TimeGranularity.Quarterly]: 90,
  [TimeGranularity.Yearly]: 365,
};

// Applied when a scenario is built without explicit run-off rates.
export const BASEL_RUNOFF_RATES: Partial<Record<LiabilityCategory, number>> = {
  [LiabilityCategory.RetailStable]: 5,
  [LiabilityCategory.RetailUnstable]: 10,
  [LiabilityCategory.CorporateDeposits]: 40,
  [LiabilityCategory.WholesaleFunding]: 100,
  [LiabilityCategory.SecuredFunding]: 25,
};
