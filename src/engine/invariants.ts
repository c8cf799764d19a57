import { BalanceSheet } from '../domain/balanceSheet';
import { AssetCategory, EquityCategory, LedgerSection } from '../domain/enums';
import { BALANCE_TOLERANCES } from '../config/regulatory';

export interface InvariantReport {
  errors: string[];
  warnings: string[];
  // assets - (liabilities + equity)
  imbalance: number;
}

const sections = (bs: BalanceSheet): Array<[LedgerSection, Partial<Record<string, number>>]> => [
  [LedgerSection.Assets, bs.assets],
  [LedgerSection.Liabilities, bs.liabilities],
  [LedgerSection.Equity, bs.equity],
];

const sum = (lines: Partial<Record<string, number>>): number =>
  Object.values(lines).reduce<number>((total, v) => total + (v ?? 0), 0);

export const findNegativeLines = (bs: BalanceSheet): string[] => {
  const errors: string[] = [];
  sections(bs).forEach(([section, lines]) => {
    Object.entries(lines).forEach(([key, value]) => {
      if (value !== undefined && value < 0) {
        errors.push(`Negative value not allowed: ${section}.${key} = ${value}`);
      }
    });
  });
  return errors;
};

// Liquidation credits cash and books losses against CET1, so both lines must exist.
export const findMissingRequiredLines = (bs: BalanceSheet): string[] => {
  const errors: string[] = [];
  if (bs.assets[AssetCategory.CashReserves] === undefined) {
    errors.push(`Missing required line: ${LedgerSection.Assets}.${AssetCategory.CashReserves}`);
  }
  if (bs.equity[EquityCategory.Cet1] === undefined) {
    errors.push(`Missing required line: ${LedgerSection.Equity}.${EquityCategory.Cet1}`);
  }
  return errors;
};

export function checkInvariants(bs: BalanceSheet): InvariantReport {
  const errors = [...findMissingRequiredLines(bs), ...findNegativeLines(bs)];
  const warnings: string[] = [];

  const assets = sum(bs.assets);
  const liabilities = sum(bs.liabilities);
  const equity = sum(bs.equity);
  const imbalance = assets - (liabilities + equity);
  const diff = Math.abs(imbalance);

  if (diff > BALANCE_TOLERANCES.fail) {
    errors.push(`Balance sheet significantly out of balance: ${diff.toFixed(2)}`);
  } else if (diff > BALANCE_TOLERANCES.warn) {
    warnings.push(
      `Balance sheet imbalance: assets=${assets.toFixed(2)}, liabilities=${liabilities.toFixed(2)}, ` +
        `equity=${equity.toFixed(2)}, difference=${diff.toFixed(2)}`
    );
  }

  return { errors, warnings, imbalance };
}
