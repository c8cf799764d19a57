import { BalanceSheet } from '../domain/balanceSheet';
import { AssetCategory, EquityCategory, LedgerSection, LiabilityCategory } from '../domain/enums';
import { UnknownCategoryError } from '../domain/errors';
import { CreditDeteriorationImpact, StressScenario } from '../domain/scenario';
import { parseOrThrow, StressScenarioInput, StressScenarioInputSchema } from '../domain/schemas';
import { BASEL_RUNOFF_RATES, PERIOD_DAYS } from '../config/regulatory';
import { FIRE_SALE_MAX_DISCOUNT } from '../config/liquidation';

/**
 * Validates a scenario record and returns a frozen scenario.
 *
 * Missing run-off rates default to the Basel standard set; `createdAt` is stamped when absent.
 * Throws `ValidationError` listing every out-of-range field.
 */
export const createStressScenario = (input: StressScenarioInput): StressScenario => stressScenarioFromRecord(input);

// Records arrive untyped from storage or import layers; the schema does the narrowing.
export const stressScenarioFromRecord = (record: unknown): StressScenario => {
  const parsed = parseOrThrow(StressScenarioInputSchema, record);
  const runoffRates =
    parsed.runoffRates && Object.keys(parsed.runoffRates).length > 0 ? parsed.runoffRates : { ...BASEL_RUNOFF_RATES };

  const scenario: StressScenario = {
    name: parsed.name,
    timeGranularity: parsed.timeGranularity,
    numPeriods: parsed.numPeriods,
    runoffRates: Object.freeze(runoffRates),
    ...(parsed.customRunoff
      ? { customRunoff: Object.freeze(parsed.customRunoff.map((row) => Object.freeze({ ...row }))) }
      : {}),
    securityShocks: Object.freeze({ ...(parsed.securityShocks ?? {}) }),
    fireSaleDiscount: parsed.fireSaleDiscount,
    fireSaleIncrement: parsed.fireSaleIncrement,
    fundingSpreadIncreaseBps: parsed.fundingSpreadIncreaseBps,
    collateralHaircutIncrease: parsed.collateralHaircutIncrease,
    loanMigrationRate: parsed.loanMigrationRate,
    provisioningRate: parsed.provisioningRate,
    rwaIncrease: parsed.rwaIncrease,
    ...(parsed.description !== undefined ? { description: parsed.description } : {}),
    createdAt: parsed.createdAt ?? new Date().toISOString(),
  };
  return Object.freeze(scenario);
};

export const getPeriodDurationDays = (scenario: StressScenario): number => PERIOD_DAYS[scenario.timeGranularity];

/**
 * Withdrawal demanded from `category` in `period`: the override table wins when it has an
 * entry, otherwise `openingBalance * rate / 100` (rate 0 for unconfigured categories).
 */
export const getRunoffForPeriod = (
  scenario: StressScenario,
  period: number,
  category: LiabilityCategory,
  openingBalance: number
): number => {
  const override = scenario.customRunoff?.[period]?.[category];
  if (override !== undefined) return override;
  const rate = scenario.runoffRates[category] ?? 0;
  return openingBalance * (rate / 100);
};

// Decimal fraction, e.g. -0.15 for a -15% shock.
export const getSecurityShock = (scenario: StressScenario, asset: AssetCategory): number =>
  (scenario.securityShocks[asset] ?? 0) / 100;

/** Base discount plus `increment` for every 10% of the available stock sold, capped at 50%. */
export const calculateFireSaleDiscount = (scenario: StressScenario, amountSold: number, totalAvailable: number): number => {
  let additional = 0;
  if (totalAvailable > 0) {
    const volumePct = (amountSold / totalAvailable) * 100;
    additional = (volumePct / 10) * scenario.fireSaleIncrement;
  }
  return Math.min(scenario.fireSaleDiscount + additional, FIRE_SALE_MAX_DISCOUNT);
};

/**
 * Migrates a share of performing loans to NPL and provisions part of the migrated amount
 * against CET1. Mutates `bs` in place.
 */
export const applyCreditDeterioration = (scenario: StressScenario, bs: BalanceSheet): CreditDeteriorationImpact => {
  const cet1 = bs.equity[EquityCategory.Cet1];
  if (cet1 === undefined) {
    throw new UnknownCategoryError(LedgerSection.Equity, EquityCategory.Cet1);
  }
  const performing = bs.assets[AssetCategory.PerformingLoans];
  const migrationAmount = performing === undefined ? 0 : performing * (scenario.loanMigrationRate / 100);
  const provision = migrationAmount * (scenario.provisioningRate / 100);

  if (performing !== undefined) {
    bs.assets[AssetCategory.PerformingLoans] = performing - migrationAmount;
    bs.assets[AssetCategory.Npl] = (bs.assets[AssetCategory.Npl] ?? 0) + migrationAmount;
  }
  bs.equity[EquityCategory.Cet1] = cet1 - provision;

  return {
    migrationAmount,
    provision,
    rwaIncreasePct: scenario.rwaIncrease,
  };
};

/** Plain record that `stressScenarioFromRecord` (or `createStressScenario`) accepts back. */
export const stressScenarioToRecord = (scenario: StressScenario): StressScenarioInput => ({
  name: scenario.name,
  timeGranularity: scenario.timeGranularity,
  numPeriods: scenario.numPeriods,
  runoffRates: { ...scenario.runoffRates },
  ...(scenario.customRunoff ? { customRunoff: scenario.customRunoff.map((row) => ({ ...row })) } : {}),
  securityShocks: { ...scenario.securityShocks },
  fireSaleDiscount: scenario.fireSaleDiscount,
  fireSaleIncrement: scenario.fireSaleIncrement,
  fundingSpreadIncreaseBps: scenario.fundingSpreadIncreaseBps,
  collateralHaircutIncrease: scenario.collateralHaircutIncrease,
  loanMigrationRate: scenario.loanMigrationRate,
  provisioningRate: scenario.provisioningRate,
  rwaIncrease: scenario.rwaIncrease,
  ...(scenario.description !== undefined ? { description: scenario.description } : {}),
  createdAt: scenario.createdAt,
});
