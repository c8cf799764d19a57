import { BalanceSheet } from '../domain/balanceSheet';
import { AssetCategory, LiabilityCategory } from '../domain/enums';
import { ComplianceStatus, LcrBreakdown, MetricsReport, NsfrBreakdown, RiskLimits } from '../domain/risks';
import { MetricsSnapshot } from '../domain/simulation';
import { HQLA_FACTORS, LCR_PARAMETERS, NO_EXPOSURE_RATIO, NSFR_PARAMETERS, RISK_LIMITS } from '../config/regulatory';
import {
  cet1Ratio,
  leverageRatio,
  loanToDepositRatio,
  tier1Ratio,
  totalAssets,
  totalCapitalRatio,
  totalDeposits,
  totalEquity,
  totalLiquidAssets,
} from './balanceSheet';

const asset = (bs: BalanceSheet, category: AssetCategory): number => bs.assets[category] ?? 0;

const weightedSum = <K extends string>(
  keys: readonly K[],
  lines: Partial<Record<K, number>>,
  factors: Partial<Record<K, number>>
): number => keys.reduce((sum, key) => sum + (lines[key] ?? 0) * (factors[key] ?? 0), 0);

const ASSET_KEYS = Object.values(AssetCategory);
const LIABILITY_KEYS = Object.values(LiabilityCategory);

/**
 * Liquidity Coverage Ratio in percent.
 *
 * Level-2 HQLA (after haircuts) is capped at 40% of the haircut HQLA total.
 * Inflows are capped at 75% and net outflows floored at 25% of gross outflows.
 */
export const calculateLcr = (bs: BalanceSheet): LcrBreakdown => {
  const level1Hqla = asset(bs, AssetCategory.HqlaLevel1) * HQLA_FACTORS.level1;
  const level2aRaw = asset(bs, AssetCategory.HqlaLevel2A);
  const level2bRaw = asset(bs, AssetCategory.HqlaLevel2B);
  const level2Haircut = level2aRaw * HQLA_FACTORS.level2A + level2bRaw * HQLA_FACTORS.level2B;
  const level2Cap = HQLA_FACTORS.level2Cap * (level1Hqla + level2Haircut);
  const level2Hqla = Math.min(level2Haircut, level2Cap);
  const hqla = level1Hqla + level2Hqla;

  const grossOutflows = weightedSum(LIABILITY_KEYS, bs.liabilities, LCR_PARAMETERS.outflowRates);
  const grossInflows = asset(bs, AssetCategory.PerformingLoans) * LCR_PARAMETERS.loanMaturityInflowRate;
  const netOutflows = Math.max(
    grossOutflows - grossInflows * LCR_PARAMETERS.inflowCap,
    grossOutflows * LCR_PARAMETERS.netOutflowFloor
  );

  return {
    lcr: netOutflows > 0 ? (hqla / netOutflows) * 100 : NO_EXPOSURE_RATIO,
    totalHqla: hqla,
    level1Hqla,
    level2Hqla,
    grossOutflows,
    grossInflows,
    netOutflows,
  };
};

/** Net Stable Funding Ratio in percent. */
export const calculateNsfr = (bs: BalanceSheet): NsfrBreakdown => {
  const availableStableFunding =
    totalEquity(bs) * NSFR_PARAMETERS.equityAsfFactor + weightedSum(LIABILITY_KEYS, bs.liabilities, NSFR_PARAMETERS.asfFactors);
  const requiredStableFunding = weightedSum(ASSET_KEYS, bs.assets, NSFR_PARAMETERS.rsfFactors);
  return {
    nsfr: requiredStableFunding > 0 ? (availableStableFunding / requiredStableFunding) * 100 : NO_EXPOSURE_RATIO,
    availableStableFunding,
    requiredStableFunding,
  };
};

export const calculateAllMetrics = (bs: BalanceSheet): MetricsReport => ({
  ...calculateLcr(bs),
  ...calculateNsfr(bs),
  cet1Ratio: cet1Ratio(bs),
  tier1Ratio: tier1Ratio(bs),
  totalCapitalRatio: totalCapitalRatio(bs),
  leverageRatio: leverageRatio(bs),
  liquidAssets: totalLiquidAssets(bs),
  totalAssets: totalAssets(bs),
  totalDeposits: totalDeposits(bs),
  loanToDepositRatio: loanToDepositRatio(bs),
});

// The subset recorded for every simulated period.
export const calculateMetricsSnapshot = (bs: BalanceSheet): MetricsSnapshot => ({
  lcr: calculateLcr(bs).lcr,
  nsfr: calculateNsfr(bs).nsfr,
  cet1Ratio: cet1Ratio(bs),
  totalCapitalRatio: totalCapitalRatio(bs),
  liquidAssets: totalLiquidAssets(bs),
  totalDeposits: totalDeposits(bs),
});

export const evaluateCompliance = (report: MetricsReport, limits: RiskLimits = RISK_LIMITS): ComplianceStatus => ({
  lcrBreached: report.lcr < limits.minLcr,
  nsfrBreached: report.nsfr < limits.minNsfr,
  cet1Breached: report.cet1Ratio < limits.minCet1Ratio,
  tier1Breached: report.tier1Ratio < limits.minTier1Ratio,
  totalCapitalBreached: report.totalCapitalRatio < limits.minTotalCapitalRatio,
});
