import { BalanceSheet, LiquidationEvent } from './balanceSheet';
import { BreachType, LiabilityCategory, RecoveryAction } from './enums';
import { SimulationEvent } from './events';
import { CreditDeteriorationImpact } from './scenario';

export interface MetricsSnapshot {
  lcr: number;
  nsfr: number;
  cet1Ratio: number;
  totalCapitalRatio: number;
  liquidAssets: number;
  totalDeposits: number;
}

export interface PeriodRecord {
  period: number;
  openingBalanceSheet: BalanceSheet;
  closingBalanceSheet: BalanceSheet;
  outflows: Partial<Record<LiabilityCategory, number>>;
  totalOutflow: number;
  liquidations: LiquidationEvent[];
  // Part of the outflow paid straight out of cash after the liquidation order ran out.
  residualCashDrawn: number;
  losses: number;
  metrics: MetricsSnapshot;
  creditImpact?: CreditDeteriorationImpact;
}

export interface BreachInfo {
  type: BreachType;
  value: number;
  threshold: number;
  period: number;
}

export interface SimulationResult {
  scenarioName: string;
  survivalHorizon: number;
  breachType: BreachType | 'None';
  breach: BreachInfo | null;
  assetDepletion: number;
  totalLosses: number;
  capitalErosion: number;
  finalLcr: number;
  finalCet1: number;
  periods: PeriodRecord[];
  recoveryActions: RecoveryAction[];
  events: SimulationEvent[];
}

export type EngineState =
  | { phase: 'initialized' }
  | { phase: 'running'; period: number }
  | { phase: 'breached'; breach: BreachInfo }
  | { phase: 'completed' };
