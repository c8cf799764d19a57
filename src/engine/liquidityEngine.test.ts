import { describe, expect, it } from 'vitest';
import { sampleBalanceSheet } from '../config/sampleBalanceSheet';
import { baselLcrStandard } from '../config/scenarios';
import {
  AssetCategory,
  BreachType,
  EquityCategory,
  LiabilityCategory,
  LiquidationLabel,
  RecoveryAction,
  TimeGranularity,
} from '../domain/enums';
import { UnknownCategoryError } from '../domain/errors';
import { SimulationEvent } from '../domain/events';
import { StressScenarioInput } from '../domain/schemas';
import { createBalanceSheet } from './balanceSheet';
import { createLiquidityEngine, getLiquidationHaircut, runSimulation } from './liquidityEngine';
import { createStressScenario } from './stressScenario';

const NO_RUNOFF = {
  [LiabilityCategory.RetailStable]: 0,
  [LiabilityCategory.RetailUnstable]: 0,
  [LiabilityCategory.CorporateDeposits]: 0,
  [LiabilityCategory.WholesaleFunding]: 0,
  [LiabilityCategory.SecuredFunding]: 0,
};

const scenario = (overrides: Partial<StressScenarioInput> = {}) =>
  createStressScenario({
    name: 'Test scenario',
    timeGranularity: TimeGranularity.Daily,
    numPeriods: 3,
    runoffRates: NO_RUNOFF,
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  });

const healthySheet = () =>
  createBalanceSheet({
    assets: {
      [AssetCategory.CashReserves]: 1000,
      [AssetCategory.HqlaLevel1]: 4000,
      [AssetCategory.PerformingLoans]: 5000,
    },
    liabilities: {
      [LiabilityCategory.RetailStable]: 6000,
      [LiabilityCategory.RetailUnstable]: 1000,
      [LiabilityCategory.CorporateDeposits]: 1000,
    },
    equity: { [EquityCategory.Cet1]: 2000 },
  });

const wholesaleSheet = () =>
  createBalanceSheet({
    assets: {
      [AssetCategory.CashReserves]: 500,
      [AssetCategory.HqlaLevel1]: 1500,
      [AssetCategory.PerformingLoans]: 3000,
    },
    liabilities: {
      [LiabilityCategory.WholesaleFunding]: 2000,
      [LiabilityCategory.RetailStable]: 2500,
    },
    equity: { [EquityCategory.Cet1]: 500 },
  });

const wipeout = () => scenario({ runoffRates: { [LiabilityCategory.WholesaleFunding]: 100 } });

describe('Liquidity engine', () => {
  it('survives the full horizon without run-off and never sells assets', () => {
    const engine = createLiquidityEngine({
      balanceSheet: healthySheet(),
      scenario: scenario({ name: 'Zero run-off', numPeriods: 30 }),
      liquidationOrder: [LiquidationLabel.Cash, LiquidationLabel.HqlaLevel1],
    });
    const result = engine.run();

    expect(result.survivalHorizon).toBe(30);
    expect(result.breachType).toBe('None');
    expect(result.breach).toBeNull();
    expect(result.periods).toHaveLength(30);
    expect(result.periods.every((p) => p.liquidations.length === 0 && p.totalOutflow === 0)).toBe(true);
    expect(result.assetDepletion).toBe(0);
    expect(result.totalLosses).toBe(0);
    expect(result.capitalErosion).toBe(0);
    expect(engine.state).toEqual({ phase: 'completed' });
  });

  it('runs credit deterioration on every tenth period only', () => {
    const result = runSimulation({
      balanceSheet: healthySheet(),
      scenario: scenario({ name: 'Zero run-off', numPeriods: 30 }),
      liquidationOrder: [],
    });

    const withImpact = result.periods.filter((p) => p.creditImpact).map((p) => p.period);
    expect(withImpact).toEqual([10, 20]);

    const tenth = result.periods[10].creditImpact;
    expect(tenth?.migrationAmount).toBeCloseTo(100, 10);
    expect(tenth?.provision).toBeCloseTo(50, 10);
    expect(tenth?.rwaIncreasePct).toBe(10);
    expect(result.periods[10].closingBalanceSheet.assets[AssetCategory.Npl]).toBeCloseTo(100, 10);
    expect(result.periods[20].creditImpact?.migrationAmount).toBeCloseTo(98, 10);

    expect(result.events.map((e) => [e.id, e.severity, e.message, e.period])).toEqual([
      ['evt-0', 'info', 'Starting simulation: Zero run-off (30 periods)', undefined],
      ['evt-1', 'info', 'Credit deterioration: 100.00 migrated to NPL, 50.00 provisioned', 10],
      ['evt-2', 'info', 'Credit deterioration: 98.00 migrated to NPL, 49.00 provisioned', 20],
      ['evt-3', 'info', 'Simulation completed: survival horizon 30 periods', undefined],
    ]);
  });

  it('reports LCR ahead of CET1 when both fail in the same period', () => {
    const bs = createBalanceSheet({
      assets: {
        [AssetCategory.CashReserves]: 100,
        [AssetCategory.HqlaLevel1]: 100,
        [AssetCategory.PerformingLoans]: 9800,
      },
      liabilities: {
        [LiabilityCategory.RetailStable]: 5000,
        [LiabilityCategory.CorporateDeposits]: 4700,
      },
      equity: { [EquityCategory.Cet1]: 300 },
    });
    const engine = createLiquidityEngine({ balanceSheet: bs, scenario: scenario(), liquidationOrder: [] });
    const result = engine.run();

    expect(result.periods[0].metrics.cet1Ratio).toBeLessThan(4.5);
    expect(result.breachType).toBe(BreachType.LCR);
    expect(result.breach?.period).toBe(0);
    expect(result.breach?.threshold).toBe(100);
    expect(result.breach?.value).toBeCloseTo((100 / 1762.5) * 100, 8);
    expect(result.survivalHorizon).toBe(0);
    expect(result.periods).toHaveLength(1);
    expect(engine.state.phase).toBe('breached');
  });

  it('reports a CET1 breach when liquidity holds', () => {
    const bs = createBalanceSheet({
      assets: {
        [AssetCategory.CashReserves]: 100,
        [AssetCategory.HqlaLevel1]: 3000,
        [AssetCategory.PerformingLoans]: 6900,
      },
      liabilities: { [LiabilityCategory.RetailStable]: 9700 },
      equity: { [EquityCategory.Cet1]: 300 },
    });
    const result = runSimulation({ balanceSheet: bs, scenario: scenario(), liquidationOrder: [] });

    expect(result.breachType).toBe(BreachType.CET1);
    expect(result.breach?.threshold).toBe(4.5);
    expect(result.breach?.value).toBeCloseTo((300 / 6900) * 100, 10);
    expect(result.finalCet1).toBeCloseTo((300 / 6900) * 100, 10);
  });

  it('reports a liquidity breach once cash and liquid assets are gone', () => {
    const bs = createBalanceSheet({
      assets: { [AssetCategory.CashReserves]: 0, [AssetCategory.PerformingLoans]: 1000 },
      liabilities: { [LiabilityCategory.OtherLiabilities]: 900 },
      equity: { [EquityCategory.Cet1]: 100 },
    });
    const result = runSimulation({ balanceSheet: bs, scenario: scenario(), liquidationOrder: [] });

    expect(result.breach).toEqual({ type: BreachType.Liquidity, value: 0, threshold: 0, period: 0 });
    expect(result.finalLcr).toBe(999.9);
  });

  it('draws a wholesale run from cash down to zero and leaves the rest unmet', () => {
    const result = runSimulation({
      balanceSheet: wholesaleSheet(),
      scenario: wipeout(),
      liquidationOrder: [LiquidationLabel.Cash],
    });

    const first = result.periods[0];
    expect(first.outflows).toEqual({
      [LiabilityCategory.RetailStable]: 0,
      [LiabilityCategory.WholesaleFunding]: 2000,
    });
    expect(first.totalOutflow).toBe(2000);
    expect(first.liquidations).toEqual([
      { assetType: AssetCategory.CashReserves, amountLiquidated: 500, haircutPct: 0, proceeds: 500, loss: 0 },
    ]);
    expect(first.residualCashDrawn).toBe(500);
    expect(first.closingBalanceSheet.assets[AssetCategory.CashReserves]).toBe(0);
    expect(first.closingBalanceSheet.liabilities[LiabilityCategory.WholesaleFunding]).toBe(0);
    expect(first.closingBalanceSheet.assets[AssetCategory.HqlaLevel1]).toBe(1500);

    expect(result.periods.slice(1).every((p) => p.liquidations.length === 0 && p.totalOutflow === 0)).toBe(true);
    expect(result.breachType).toBe('None');
    expect(result.survivalHorizon).toBe(3);
    expect(result.assetDepletion).toBe(500);
  });

  it('runs the sample ledger through the regulatory-standard preset', () => {
    const result = runSimulation({
      balanceSheet: createBalanceSheet(sampleBalanceSheet),
      scenario: baselLcrStandard(),
      liquidationOrder: [
        LiquidationLabel.Cash,
        LiquidationLabel.HqlaLevel1,
        LiquidationLabel.HqlaLevel2A,
        LiquidationLabel.HqlaLevel2B,
      ],
    });

    const first = result.periods[0];
    expect(first.outflows).toEqual({
      [LiabilityCategory.RetailStable]: 400,
      [LiabilityCategory.RetailUnstable]: 400,
      [LiabilityCategory.CorporateDeposits]: 1200,
      [LiabilityCategory.WholesaleFunding]: 2000,
      [LiabilityCategory.SecuredFunding]: 375,
    });
    expect(first.totalOutflow).toBe(4375);
    expect(first.liquidations.map((l) => [l.assetType, l.amountLiquidated, l.haircutPct])).toEqual([
      [AssetCategory.CashReserves, 1000, 0],
      [AssetCategory.HqlaLevel1, 2000, 0],
      [AssetCategory.HqlaLevel2A, 500, 5],
      [AssetCategory.HqlaLevel2B, 300, 15],
    ]);
    expect(first.liquidations[2].loss).toBeCloseTo(25, 8);
    expect(first.liquidations[3].loss).toBeCloseTo(45, 8);
    expect(first.residualCashDrawn).toBeCloseTo(645, 8);
    expect(first.closingBalanceSheet.assets[AssetCategory.CashReserves]).toBeCloseTo(3085, 8);
    expect(first.closingBalanceSheet.equity[EquityCategory.Cet1]).toBeCloseTo(1430, 8);

    expect(result.breachType).toBe(BreachType.LCR);
    expect(result.survivalHorizon).toBe(0);
    expect(result.survivalHorizon).toBeLessThanOrEqual(30);
    expect(result.finalLcr).toBe(0);
    expect(result.finalCet1).toBeCloseTo((1430 / 17350) * 100, 8);
    expect(result.assetDepletion).toBe(3800);
    expect(result.totalLosses).toBeCloseTo(70, 8);
    expect(result.capitalErosion).toBeCloseTo(3.5, 8);
  });

  it('adds the fire-sale discount except for cash and level-1 HQLA', () => {
    const stressed = scenario({ fireSaleDiscount: 10 });
    expect(getLiquidationHaircut(stressed, AssetCategory.CashReserves)).toBe(0);
    expect(getLiquidationHaircut(stressed, AssetCategory.HqlaLevel1)).toBe(0);
    expect(getLiquidationHaircut(stressed, AssetCategory.HqlaLevel2A)).toBe(15);
    expect(getLiquidationHaircut(stressed, AssetCategory.OtherSecurities)).toBe(35);
    expect(getLiquidationHaircut(stressed, AssetCategory.RealEstate)).toBe(50);
    expect(getLiquidationHaircut(stressed, AssetCategory.Npl)).toBe(30);
  });

  it('grosses up a sale so proceeds cover the outflow', () => {
    const bs = createBalanceSheet({
      assets: { [AssetCategory.CashReserves]: 0, [AssetCategory.OtherSecurities]: 1000 },
      liabilities: { [LiabilityCategory.WholesaleFunding]: 300 },
      equity: { [EquityCategory.Cet1]: 700 },
    });
    const result = runSimulation({
      balanceSheet: bs,
      scenario: scenario({ numPeriods: 1, fireSaleDiscount: 10, runoffRates: { [LiabilityCategory.WholesaleFunding]: 100 } }),
      liquidationOrder: [LiquidationLabel.OtherSecurities],
    });

    const [sale] = result.periods[0].liquidations;
    expect(sale.haircutPct).toBe(35);
    expect(sale.amountLiquidated).toBeCloseTo(300 / 0.65, 8);
    expect(sale.proceeds).toBeCloseTo(300, 8);
    expect(result.periods[0].residualCashDrawn).toBe(0);
    expect(result.periods[0].closingBalanceSheet.assets[AssetCategory.CashReserves]).toBeCloseTo(300, 8);
  });

  it('skips assets whose haircut leaves nothing to raise', () => {
    const bs = createBalanceSheet({
      assets: { [AssetCategory.CashReserves]: 100, [AssetCategory.RealEstate]: 1000 },
      liabilities: { [LiabilityCategory.WholesaleFunding]: 500 },
      equity: { [EquityCategory.Cet1]: 600 },
    });
    const result = runSimulation({
      balanceSheet: bs,
      scenario: scenario({ numPeriods: 1, fireSaleDiscount: 60, runoffRates: { [LiabilityCategory.WholesaleFunding]: 100 } }),
      liquidationOrder: [LiquidationLabel.RealEstate],
    });

    expect(result.periods[0].liquidations).toEqual([]);
    expect(result.periods[0].residualCashDrawn).toBe(100);
    expect(result.breachType).toBe(BreachType.Liquidity);
  });

  it('warns once per unknown liquidation label and otherwise ignores it', () => {
    const result = runSimulation({
      balanceSheet: wholesaleSheet(),
      scenario: wipeout(),
      liquidationOrder: ['Gold', LiquidationLabel.Cash, 'Gold', 'Unobtanium'],
    });

    expect(result.events.filter((e) => e.severity === 'warning')).toEqual([
      { id: 'evt-1', severity: 'warning', message: 'Skipped unknown liquidation label "Gold"' },
      { id: 'evt-2', severity: 'warning', message: 'Skipped unknown liquidation label "Unobtanium"' },
    ]);
    expect(result.periods[0].liquidations).toHaveLength(1);
    expect(result.survivalHorizon).toBe(3);
  });

  it('produces identical results for identical inputs', () => {
    const options = {
      balanceSheet: createBalanceSheet(sampleBalanceSheet),
      scenario: baselLcrStandard(),
      liquidationOrder: [LiquidationLabel.Cash, LiquidationLabel.HqlaLevel1],
    };
    const engine = createLiquidityEngine(options);
    const first = engine.run();
    const second = engine.run();
    const third = runSimulation(options);

    expect(second).toEqual(first);
    expect(third).toEqual(first);
    expect(engine.periodResults).toHaveLength(first.periods.length);
  });

  it('never mutates the caller ledger', () => {
    const bs = wholesaleSheet();
    runSimulation({ balanceSheet: bs, scenario: wipeout(), liquidationOrder: [LiquidationLabel.Cash] });
    expect(bs.assets[AssetCategory.CashReserves]).toBe(500);
    expect(bs.liabilities[LiabilityCategory.WholesaleFunding]).toBe(2000);
  });

  it('reports progress after each period and forwards events', () => {
    const progress: Array<[number, string]> = [];
    const seen: SimulationEvent[] = [];
    const result = runSimulation(
      {
        balanceSheet: wholesaleSheet(),
        scenario: wipeout(),
        liquidationOrder: [LiquidationLabel.Cash],
        onEvent: (e) => seen.push(e),
      },
      { onProgress: (period, status) => progress.push([period, status]) }
    );

    expect(progress).toEqual([
      [0, 'Period 1/3'],
      [1, 'Period 2/3'],
      [2, 'Period 3/3'],
    ]);
    expect(seen).toEqual(result.events);
  });

  it('reports the breach in the progress status', () => {
    const progress: string[] = [];
    runSimulation(
      {
        balanceSheet: createBalanceSheet(sampleBalanceSheet),
        scenario: baselLcrStandard(),
        liquidationOrder: [
          LiquidationLabel.Cash,
          LiquidationLabel.HqlaLevel1,
          LiquidationLabel.HqlaLevel2A,
          LiquidationLabel.HqlaLevel2B,
        ],
      },
      { onProgress: (_period, status) => progress.push(status) }
    );
    expect(progress).toEqual(['LCR breach at period 0']);
  });

  it('survives the preset when only cash is in the liquidation order', () => {
    const progress: string[] = [];
    const result = runSimulation(
      {
        balanceSheet: createBalanceSheet(sampleBalanceSheet),
        scenario: baselLcrStandard(),
        liquidationOrder: [LiquidationLabel.Cash],
      },
      { onProgress: (_period, status) => progress.push(status) }
    );
    expect(result.breachType).toBe('None');
    expect(result.periods[0].closingBalanceSheet.assets[AssetCategory.CashReserves]).toBe(0);
    expect(progress).toHaveLength(30);
    expect(progress[0]).toBe('Period 1/30');
    expect(progress[29]).toBe('Period 30/30');
  });

  it('hands back a trace the engine does not share', () => {
    const engine = createLiquidityEngine({
      balanceSheet: wholesaleSheet(),
      scenario: wipeout(),
      liquidationOrder: [LiquidationLabel.Cash],
    });
    const result = engine.run();
    result.periods.pop();
    expect(result.periods).toHaveLength(2);
    expect(engine.periodResults).toHaveLength(3);
  });

  it('records recovery actions without acting on them', () => {
    const base = {
      balanceSheet: wholesaleSheet(),
      scenario: wipeout(),
      liquidationOrder: [LiquidationLabel.Cash],
    };
    const plain = runSimulation(base);
    const withActions = runSimulation({ ...base, recoveryActions: [RecoveryAction.CapitalRaising] });

    expect(withActions.recoveryActions).toEqual([RecoveryAction.CapitalRaising]);
    expect(withActions.periods).toEqual(plain.periods);
    expect(plain.recoveryActions).toEqual([]);
  });

  it('aborts on a ledger missing a line that liquidation writes to', () => {
    const engine = createLiquidityEngine({
      balanceSheet: {
        assets: { [AssetCategory.CashReserves]: 100, [AssetCategory.HqlaLevel1]: 100 },
        liabilities: { [LiabilityCategory.WholesaleFunding]: 50 },
        equity: {},
      },
      scenario: wipeout(),
      liquidationOrder: [LiquidationLabel.HqlaLevel1],
    });

    expect(() => engine.run()).toThrow(UnknownCategoryError);
    expect(engine.state).toEqual({ phase: 'running', period: 0 });
  });
});
