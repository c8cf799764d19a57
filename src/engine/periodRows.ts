import { AssetCategory, EquityCategory } from '../domain/enums';
import { PeriodRecord } from '../domain/simulation';
import { PeriodRow } from '../types/statements';

export const toPeriodRows = (periods: readonly PeriodRecord[]): PeriodRow[] =>
  periods.map((p) => ({
    period: p.period,
    totalOutflow: p.totalOutflow,
    amountLiquidated: p.liquidations.reduce((sum, l) => sum + l.amountLiquidated, 0),
    proceeds: p.liquidations.reduce((sum, l) => sum + l.proceeds, 0),
    losses: p.losses,
    residualCashDrawn: p.residualCashDrawn,
    closingCash: p.closingBalanceSheet.assets[AssetCategory.CashReserves] ?? 0,
    closingCet1: p.closingBalanceSheet.equity[EquityCategory.Cet1] ?? 0,
    lcr: p.metrics.lcr,
    nsfr: p.metrics.nsfr,
    cet1Ratio: p.metrics.cet1Ratio,
    totalCapitalRatio: p.metrics.totalCapitalRatio,
    liquidAssets: p.metrics.liquidAssets,
    totalDeposits: p.metrics.totalDeposits,
    creditMigration: p.creditImpact?.migrationAmount ?? 0,
    creditProvision: p.creditImpact?.provision ?? 0,
  }));
