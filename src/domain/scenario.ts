import { AssetCategory, LiabilityCategory, TimeGranularity } from './enums';

export type RunoffRates = Readonly<Partial<Record<LiabilityCategory, number>>>;
export type SecurityShocks = Readonly<Partial<Record<AssetCategory, number>>>;

// Explicit withdrawal amounts for one period; a missing category falls back to its run-off rate.
export type RunoffOverrideRow = Readonly<Partial<Record<LiabilityCategory, number>>>;

/**
 * Validated, frozen stress parameters. All rates are percentages (5 means 5%), the funding
 * spread is in basis points.
 */
export interface StressScenario {
  readonly name: string;
  readonly timeGranularity: TimeGranularity;
  readonly numPeriods: number;
  readonly runoffRates: RunoffRates;
  // Indexed by period.
  readonly customRunoff?: ReadonlyArray<RunoffOverrideRow>;
  readonly securityShocks: SecurityShocks;
  readonly fireSaleDiscount: number;
  readonly fireSaleIncrement: number;
  readonly fundingSpreadIncreaseBps: number;
  readonly collateralHaircutIncrease: number;
  readonly loanMigrationRate: number;
  readonly provisioningRate: number;
  readonly rwaIncrease: number;
  readonly description?: string;
  readonly createdAt: string;
}

export interface CreditDeteriorationImpact {
  migrationAmount: number;
  provision: number;
  // Reported only; RWA is always recomputed from asset balances.
  rwaIncreasePct: number;
}
