import { renderToStaticMarkup } from 'react-dom/server';
import type { ReactElement } from 'react';
import { sampleBalanceSheet } from '../config/sampleBalanceSheet';
import { baselLcrStandard } from '../config/scenarios';
import { AssetCategory, EquityCategory, LiabilityCategory, LiquidationLabel, TimeGranularity } from '../domain/enums';
import { createBalanceSheet } from '../engine/balanceSheet';
import { runSimulation } from '../engine/liquidityEngine';
import { createStressScenario } from '../engine/stressScenario';

// Static markup without React's text separators, so adjacent text nodes read as one string.
export const render = (element: ReactElement): string => renderToStaticMarkup(element).replace(/<!-- -->/g, '');

export const breachedRun = () =>
  runSimulation({
    balanceSheet: createBalanceSheet(sampleBalanceSheet),
    scenario: baselLcrStandard(),
    liquidationOrder: [
      LiquidationLabel.Cash,
      LiquidationLabel.HqlaLevel1,
      LiquidationLabel.HqlaLevel2A,
      LiquidationLabel.HqlaLevel2B,
    ],
  });

export const survivingRun = () =>
  runSimulation({
    balanceSheet: createBalanceSheet({
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
    }),
    scenario: createStressScenario({
      name: 'Wholesale run',
      timeGranularity: TimeGranularity.Daily,
      numPeriods: 3,
      runoffRates: { [LiabilityCategory.WholesaleFunding]: 100 },
    }),
    liquidationOrder: [LiquidationLabel.Cash],
  });
