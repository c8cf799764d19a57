export interface LcrBreakdown {
  lcr: number;
  // HQLA after haircuts and the level-2 cap.
  totalHqla: number;
  level1Hqla: number;
  level2Hqla: number;
  grossOutflows: number;
  grossInflows: number;
  netOutflows: number;
}

export interface NsfrBreakdown {
  nsfr: number;
  availableStableFunding: number;
  requiredStableFunding: number;
}

export interface MetricsReport extends LcrBreakdown, NsfrBreakdown {
  cet1Ratio: number;
  tier1Ratio: number;
  totalCapitalRatio: number;
  leverageRatio: number;
  liquidAssets: number;
  totalAssets: number;
  totalDeposits: number;
  loanToDepositRatio: number;
}

// All limits in percent.
export interface RiskLimits {
  minLcr: number;
  minNsfr: number;
  minCet1Ratio: number;
  minTier1Ratio: number;
  minTotalCapitalRatio: number;
}

export interface ComplianceStatus {
  lcrBreached: boolean;
  nsfrBreached: boolean;
  cet1Breached: boolean;
  tier1Breached: boolean;
  totalCapitalBreached: boolean;
}

export interface AlertThresholds {
  lcrWarning: number;
  lcrCritical: number;
  cet1Warning: number;
  cet1Critical: number;
}

export type AlertLevel = 'ok' | 'warning' | 'critical' | 'breach';
