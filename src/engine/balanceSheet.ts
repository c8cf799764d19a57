/**
 * Ledger queries and mutations.
 *
 * Queries are computed from the current line maps on every call; nothing is cached.
 * `applyWithdrawal` and `liquidateAsset` mutate the ledger in place, so callers that need the
 * original must take a `cloneBalanceSheet` first.
 */
import { BalanceSheet, BalanceSheetRow, LiquidationEvent } from '../domain/balanceSheet';
import { AssetCategory, EquityCategory, LedgerSection, LiabilityCategory } from '../domain/enums';
import { UnknownCategoryError, ValidationError } from '../domain/errors';
import { EventListener } from '../domain/events';
import { ASSET_META, EQUITY_META, LIABILITY_META } from '../domain/productMeta';
import { BalanceSheetInput, BalanceSheetInputSchema, parseOrThrow } from '../domain/schemas';
import { HQLA_FACTORS, RWA_WEIGHTS } from '../config/regulatory';
import { createEventLog } from './eventLog';
import { checkInvariants, findMissingRequiredLines, findNegativeLines, InvariantReport } from './invariants';

const DEPOSIT_CATEGORIES: LiabilityCategory[] = Object.values(LIABILITY_META)
  .filter((meta) => meta.isDeposit)
  .map((meta) => meta.key);

const lineValue = <K extends string>(lines: Partial<Record<K, number>>, key: K): number => lines[key] ?? 0;

const sumLines = (lines: Partial<Record<string, number>>): number =>
  Object.values(lines).reduce<number>((sum, v) => sum + (v ?? 0), 0);

/**
 * Builds a ledger from an input record.
 *
 * Rejects unknown line keys, non-finite or negative amounts and a ledger without the
 * `cash_reserves` or `cet1` lines. The balance equation is left to `validateBalanceSheet`.
 */
export const createBalanceSheet = (input: BalanceSheetInput): BalanceSheet => balanceSheetFromRecord(input);

// Rows from a form or an import layer arrive untyped; the schema does the narrowing.
export const balanceSheetFromRecord = (record: unknown): BalanceSheet => {
  const bs: BalanceSheet = parseOrThrow(BalanceSheetInputSchema, record);
  const errors = [...findMissingRequiredLines(bs), ...findNegativeLines(bs)];
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  return bs;
};

/**
 * Full integrity check, including assets = liabilities + equity within tolerance.
 * Small mismatches are reported to `onEvent` as warnings; anything worse throws.
 */
export const validateBalanceSheet = (bs: BalanceSheet, onEvent?: EventListener): InvariantReport => {
  const report = checkInvariants(bs);
  if (report.errors.length > 0) {
    throw new ValidationError(report.errors);
  }
  const log = createEventLog(onEvent, 'validation');
  report.warnings.forEach((w) => log.push('warning', w));
  return report;
};

export const totalAssets = (bs: BalanceSheet): number => sumLines(bs.assets);

export const totalLiabilities = (bs: BalanceSheet): number => sumLines(bs.liabilities);

export const totalEquity = (bs: BalanceSheet): number => sumLines(bs.equity);

/**
 * Sum of the three HQLA tiers. With `applyHaircuts`, level 2A and 2B are scaled by their
 * regulatory factors; the level-2 cap is not applied here (see `calculateLcr`).
 */
export const totalHqla = (bs: BalanceSheet, applyHaircuts = false): number => {
  const level1 = lineValue(bs.assets, AssetCategory.HqlaLevel1);
  const level2a = lineValue(bs.assets, AssetCategory.HqlaLevel2A);
  const level2b = lineValue(bs.assets, AssetCategory.HqlaLevel2B);
  if (!applyHaircuts) return level1 + level2a + level2b;
  return level1 * HQLA_FACTORS.level1 + level2a * HQLA_FACTORS.level2A + level2b * HQLA_FACTORS.level2B;
};

export const totalDeposits = (bs: BalanceSheet): number =>
  DEPOSIT_CATEGORIES.reduce((sum, category) => sum + lineValue(bs.liabilities, category), 0);

export const totalRetailDeposits = (bs: BalanceSheet): number =>
  lineValue(bs.liabilities, LiabilityCategory.RetailStable) + lineValue(bs.liabilities, LiabilityCategory.RetailUnstable);

// Cash plus unhaircut HQLA.
export const totalLiquidAssets = (bs: BalanceSheet): number =>
  lineValue(bs.assets, AssetCategory.CashReserves) + totalHqla(bs);

export const tier1Capital = (bs: BalanceSheet): number =>
  lineValue(bs.equity, EquityCategory.Cet1) + lineValue(bs.equity, EquityCategory.At1);

export const totalCapital = (bs: BalanceSheet): number => totalEquity(bs);

export const rwaEstimate = (bs: BalanceSheet): number =>
  Object.values(AssetCategory).reduce(
    (sum, category) => sum + lineValue(bs.assets, category) * (RWA_WEIGHTS[category] ?? 0),
    0
  );

// A zero denominator yields 0 rather than an error.
const pctOf = (numerator: number, denominator: number): number =>
  denominator === 0 ? 0 : (numerator / denominator) * 100;

export const cet1Ratio = (bs: BalanceSheet): number => pctOf(lineValue(bs.equity, EquityCategory.Cet1), rwaEstimate(bs));

export const tier1Ratio = (bs: BalanceSheet): number => pctOf(tier1Capital(bs), rwaEstimate(bs));

export const totalCapitalRatio = (bs: BalanceSheet): number => pctOf(totalCapital(bs), rwaEstimate(bs));

export const leverageRatio = (bs: BalanceSheet): number => pctOf(totalEquity(bs), totalAssets(bs));

export const loanToDepositRatio = (bs: BalanceSheet): number =>
  pctOf(lineValue(bs.assets, AssetCategory.PerformingLoans), totalDeposits(bs));

/**
 * Withdraws up to `amount` from a liability line; the line never goes below zero.
 * Returns the amount actually withdrawn.
 */
export const applyWithdrawal = (bs: BalanceSheet, category: LiabilityCategory, amount: number): number => {
  const current = bs.liabilities[category];
  if (current === undefined) {
    throw new UnknownCategoryError(LedgerSection.Liabilities, category);
  }
  const withdrawal = Math.max(0, Math.min(amount, current));
  bs.liabilities[category] = current - withdrawal;
  return withdrawal;
};

/**
 * Sells up to `amount` of an asset at `haircutPct` below book value.
 *
 * Proceeds are credited to cash and the haircut loss is booked straight against CET1.
 * Selling cash itself therefore leaves the cash line unchanged.
 */
export const liquidateAsset = (
  bs: BalanceSheet,
  category: AssetCategory,
  amount: number,
  haircutPct = 0
): LiquidationEvent => {
  const available = bs.assets[category];
  if (available === undefined) {
    throw new UnknownCategoryError(LedgerSection.Assets, category);
  }
  if (bs.assets[AssetCategory.CashReserves] === undefined) {
    throw new UnknownCategoryError(LedgerSection.Assets, AssetCategory.CashReserves);
  }
  const cet1 = bs.equity[EquityCategory.Cet1];
  if (cet1 === undefined) {
    throw new UnknownCategoryError(LedgerSection.Equity, EquityCategory.Cet1);
  }

  const liquidated = Math.max(0, Math.min(amount, available));
  const proceeds = liquidated * (1 - haircutPct / 100);
  const loss = liquidated - proceeds;

  bs.assets[category] = available - liquidated;
  bs.assets[AssetCategory.CashReserves] = lineValue(bs.assets, AssetCategory.CashReserves) + proceeds;
  bs.equity[EquityCategory.Cet1] = cet1 - loss;

  return {
    assetType: category,
    amountLiquidated: liquidated,
    haircutPct,
    proceeds,
    loss,
  };
};

/** Tabular view for display: one row per line present, plus the two total rows. */
export const toBalanceSheetRows = (bs: BalanceSheet): BalanceSheetRow[] => {
  const assetsTotal = totalAssets(bs);
  const share = (amount: number) => pctOf(amount, assetsTotal);
  const rows: BalanceSheetRow[] = [];

  Object.values(ASSET_META).forEach((meta) => {
    const amount = bs.assets[meta.key];
    if (amount === undefined) return;
    rows.push({ section: LedgerSection.Assets, item: meta.label, amount, sharePct: share(amount) });
  });
  rows.push({ section: 'total', item: 'TOTAL ASSETS', amount: assetsTotal, sharePct: 100 });

  Object.values(LIABILITY_META).forEach((meta) => {
    const amount = bs.liabilities[meta.key];
    if (amount === undefined) return;
    rows.push({ section: LedgerSection.Liabilities, item: meta.label, amount, sharePct: share(amount) });
  });
  Object.values(EQUITY_META).forEach((meta) => {
    const amount = bs.equity[meta.key];
    if (amount === undefined) return;
    rows.push({ section: LedgerSection.Equity, item: meta.label, amount, sharePct: share(amount) });
  });
  rows.push({
    section: 'total',
    item: 'TOTAL LIABILITIES + EQUITY',
    amount: totalLiabilities(bs) + totalEquity(bs),
    sharePct: 100,
  });

  return rows;
};
