/**
 * Read-only post-processing of a finished run. Nothing here mutates the result.
 */
import {
  AssetDepletionAnalysis,
  BreachAnalysis,
  MetricsTrajectory,
  SummaryReport,
} from '../domain/analysis';
import { BreachType } from '../domain/enums';
import { AlertLevel, AlertThresholds } from '../domain/risks';
import { BreachInfo, SimulationResult } from '../domain/simulation';
import { ALERT_THRESHOLDS, RISK_LIMITS } from '../config/regulatory';

// Outflows above this multiple of realized losses mark a run as deposit-driven.
const DEPOSIT_DRIVER_MULTIPLE = 5;

export const getSurvivalHorizon = (result: SimulationResult): number => result.survivalHorizon;

const describeBreach = (breach: BreachInfo): Pick<Extract<BreachAnalysis, { breached: true }>, 'severity' | 'message'> => {
  switch (breach.type) {
    case BreachType.LCR:
      return {
        severity: 'Critical',
        message:
          `Liquidity Coverage Ratio fell below 100% at period ${breach.period}. ` +
          'The bank exhausted its high-quality liquid assets and could no longer meet stressed 30-day outflows.',
      };
    case BreachType.CET1:
      return {
        severity: 'Critical',
        message:
          `CET1 capital ratio fell below 4.5% at period ${breach.period}. ` +
          'Realized losses from asset liquidations eroded capital below minimum regulatory requirements.',
      };
    case BreachType.Liquidity:
      return {
        severity: 'Fatal',
        message:
          `Complete liquidity depletion at period ${breach.period}. ` +
          'The bank ran out of all liquid assets including cash.',
      };
  }
};

export const getBreachAnalysis = (result: SimulationResult): BreachAnalysis => {
  const { breach } = result;
  if (!breach) {
    return { breached: false, message: 'No breach detected - bank survives full scenario' };
  }
  return {
    breached: true,
    type: breach.type,
    period: breach.period,
    value: breach.value,
    threshold: breach.threshold,
    ...describeBreach(breach),
  };
};

/** Periods where LCR or CET1 sat inside the warning band, whether or not the run breached. */
export const getCriticalPeriods = (
  result: SimulationResult,
  thresholds: AlertThresholds = ALERT_THRESHOLDS
): number[] =>
  result.periods
    .filter((p) => p.metrics.lcr < thresholds.lcrWarning || p.metrics.cet1Ratio < thresholds.cet1Warning)
    .map((p) => p.period);

export const getPrimaryDriver = (result: SimulationResult): string => {
  const { breach } = result;
  if (!breach) return 'No failure - scenario survived';
  if (breach.type === BreachType.CET1) return 'Realized losses from asset liquidations eroded capital';

  const upToBreach = result.periods.filter((p) => p.period <= breach.period);
  const outflows = upToBreach.reduce((sum, p) => sum + p.totalOutflow, 0);
  const losses = upToBreach.reduce((sum, p) => sum + p.losses, 0);
  return outflows > losses * DEPOSIT_DRIVER_MULTIPLE
    ? 'Severe deposit withdrawals exceeded liquidity buffers'
    : 'Asset fire-sale losses depleted liquidity';
};

export const getAssetDepletionAnalysis = (result: SimulationResult): AssetDepletionAnalysis => {
  const analysis: AssetDepletionAnalysis = {};
  result.periods.forEach((p) => {
    p.liquidations.forEach((l) => {
      const entry = analysis[l.assetType] ?? { totalSold: 0, totalLoss: 0, count: 0, avgHaircut: 0 };
      entry.totalSold += l.amountLiquidated;
      entry.totalLoss += l.loss;
      entry.count += 1;
      entry.avgHaircut = entry.totalSold > 0 ? (entry.totalLoss / entry.totalSold) * 100 : 0;
      analysis[l.assetType] = entry;
    });
  });
  return analysis;
};

export const getMetricsTrajectory = (result: SimulationResult): MetricsTrajectory => ({
  lcr: result.periods.map((p) => ({ step: p.period, value: p.metrics.lcr })),
  cet1Ratio: result.periods.map((p) => ({ step: p.period, value: p.metrics.cet1Ratio })),
  liquidAssets: result.periods.map((p) => ({ step: p.period, value: p.metrics.liquidAssets })),
  totalDeposits: result.periods.map((p) => ({ step: p.period, value: p.metrics.totalDeposits })),
});

export const generateSummaryReport = (result: SimulationResult): SummaryReport => ({
  scenarioName: result.scenarioName,
  survivalHorizon: getSurvivalHorizon(result),
  breachAnalysis: getBreachAnalysis(result),
  primaryDriver: getPrimaryDriver(result),
  criticalPeriods: getCriticalPeriods(result),
  assetDepletion: getAssetDepletionAnalysis(result),
  totalAssetDepletion: result.assetDepletion,
  totalLosses: result.totalLosses,
  capitalErosionPct: result.capitalErosion,
  finalLcr: result.finalLcr,
  finalCet1: result.finalCet1,
});

export type AlertMetric = 'lcr' | 'cet1';

// Below the regulatory minimum is a breach; the warning and critical bands sit above it.
export const classifyMetricAlert = (
  metric: AlertMetric,
  value: number,
  thresholds: AlertThresholds = ALERT_THRESHOLDS
): AlertLevel => {
  const [minimum, critical, warning] =
    metric === 'lcr'
      ? [RISK_LIMITS.minLcr, thresholds.lcrCritical, thresholds.lcrWarning]
      : [RISK_LIMITS.minCet1Ratio, thresholds.cet1Critical, thresholds.cet1Warning];
  if (value < minimum) return 'breach';
  if (value < critical) return 'critical';
  if (value < warning) return 'warning';
  return 'ok';
};
