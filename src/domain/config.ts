import { AssetCategory, LiabilityCategory } from './enums';

export interface HqlaFactors {
  level1: number;
  level2A: number;
  level2B: number;
  // Maximum share of capped HQLA that level-2 assets may make up.
  level2Cap: number;
}

export interface LcrParameters {
  outflowRates: Partial<Record<LiabilityCategory, number>>;
  // Share of performing loans assumed to mature inside the 30-day window.
  loanMaturityInflowRate: number;
  inflowCap: number;
  // Net outflows never fall below this share of gross outflows.
  netOutflowFloor: number;
}

export interface NsfrParameters {
  equityAsfFactor: number;
  asfFactors: Partial<Record<LiabilityCategory, number>>;
  rsfFactors: Partial<Record<AssetCategory, number>>;
}

export interface BalanceTolerances {
  // Mismatches above this are logged.
  warn: number;
  // Mismatches above this are rejected.
  fail: number;
}
