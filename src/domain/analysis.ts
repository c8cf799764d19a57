import { AssetCategory, BreachType } from './enums';
import { SeriesPoint } from '../types/statements';

export type BreachSeverity = 'Critical' | 'Fatal';

export type BreachAnalysis =
  | { breached: false; message: string }
  | {
      breached: true;
      type: BreachType;
      period: number;
      value: number;
      threshold: number;
      severity: BreachSeverity;
      message: string;
    };

export interface AssetDepletionEntry {
  totalSold: number;
  totalLoss: number;
  count: number;
  // Realized loss as a percentage of the amount sold.
  avgHaircut: number;
}

export type AssetDepletionAnalysis = Partial<Record<AssetCategory, AssetDepletionEntry>>;

export interface MetricsTrajectory {
  lcr: SeriesPoint[];
  cet1Ratio: SeriesPoint[];
  liquidAssets: SeriesPoint[];
  totalDeposits: SeriesPoint[];
}

export interface SummaryReport {
  scenarioName: string;
  survivalHorizon: number;
  breachAnalysis: BreachAnalysis;
  primaryDriver: string;
  criticalPeriods: number[];
  assetDepletion: AssetDepletionAnalysis;
  totalAssetDepletion: number;
  totalLosses: number;
  capitalErosionPct: number;
  finalLcr: number;
  finalCet1: number;
}
