// Built-in stress scenarios, selectable by id in the dashboard or by name from code.
import { LiabilityCategory, AssetCategory, TimeGranularity } from '../domain/enums';
import { ValidationError } from '../domain/errors';
import { StressScenario } from '../domain/scenario';
import { StressScenarioInput } from '../domain/schemas';
import { createStressScenario } from '../engine/stressScenario';

export interface ScenarioPreset {
  id: string;
  name: string;
  description: string;
  input: StressScenarioInput;
}

export const scenarios: ScenarioPreset[] = [
  {
    id: 'basel-lcr-standard',
    name: 'Basel III LCR Standard',
    description: 'Standard Basel III LCR stress scenario over 30 days',
    input: {
      name: 'Basel III LCR Standard',
      timeGranularity: TimeGranularity.Daily,
      numPeriods: 30,
      runoffRates: {
        [LiabilityCategory.RetailStable]: 5,
        [LiabilityCategory.RetailUnstable]: 10,
        [LiabilityCategory.CorporateDeposits]: 40,
        [LiabilityCategory.WholesaleFunding]: 100,
        [LiabilityCategory.SecuredFunding]: 25,
      },
      securityShocks: {},
      fireSaleDiscount: 0,
      description: 'Standard Basel III LCR stress scenario over 30 days',
    },
  },
  {
    id: 'severe-combined-stress',
    name: 'Severe Combined Stress',
    description: 'Severe stress combining deposit runs, market shocks, and credit deterioration',
    input: {
      name: 'Severe Combined Stress',
      timeGranularity: TimeGranularity.Daily,
      numPeriods: 60,
      runoffRates: {
        [LiabilityCategory.RetailStable]: 15,
        [LiabilityCategory.RetailUnstable]: 30,
        [LiabilityCategory.CorporateDeposits]: 60,
        [LiabilityCategory.WholesaleFunding]: 100,
        [LiabilityCategory.SecuredFunding]: 50,
      },
      securityShocks: {
        [AssetCategory.HqlaLevel1]: 0,
        [AssetCategory.HqlaLevel2A]: -10,
        [AssetCategory.HqlaLevel2B]: -25,
        [AssetCategory.OtherSecurities]: -40,
      },
      fireSaleDiscount: 15,
      fireSaleIncrement: 3,
      fundingSpreadIncreaseBps: 250,
      collateralHaircutIncrease: 20,
      loanMigrationRate: 5,
      provisioningRate: 60,
      rwaIncrease: 15,
      description: 'Severe stress combining deposit runs, market shocks, and credit deterioration',
    },
  },
  {
    id: 'idiosyncratic-crisis',
    name: 'Idiosyncratic Bank Crisis',
    description: 'Severe idiosyncratic crisis with major deposit flight',
    input: {
      name: 'Idiosyncratic Bank Crisis',
      timeGranularity: TimeGranularity.Daily,
      numPeriods: 90,
      runoffRates: {
        [LiabilityCategory.RetailStable]: 20,
        [LiabilityCategory.RetailUnstable]: 50,
        [LiabilityCategory.CorporateDeposits]: 80,
        [LiabilityCategory.WholesaleFunding]: 100,
        [LiabilityCategory.SecuredFunding]: 75,
      },
      securityShocks: {
        [AssetCategory.HqlaLevel1]: 0,
        [AssetCategory.HqlaLevel2A]: -15,
        [AssetCategory.HqlaLevel2B]: -35,
        [AssetCategory.OtherSecurities]: -50,
      },
      fireSaleDiscount: 20,
      fireSaleIncrement: 5,
      fundingSpreadIncreaseBps: 500,
      collateralHaircutIncrease: 30,
      loanMigrationRate: 8,
      provisioningRate: 70,
      rwaIncrease: 25,
      description: 'Severe idiosyncratic crisis with major deposit flight',
    },
  },
];

export const getScenarioPreset = (id: string | null | undefined): ScenarioPreset | undefined =>
  scenarios.find((s) => s.id === id);

export const buildPresetScenario = (id: string): StressScenario => {
  const preset = getScenarioPreset(id);
  if (!preset) {
    throw new ValidationError([`Unknown scenario preset: ${id}`]);
  }
  return createStressScenario(preset.input);
};

export const baselLcrStandard = (): StressScenario => buildPresetScenario('basel-lcr-standard');

export const severeCombinedStress = (): StressScenario => buildPresetScenario('severe-combined-stress');

export const idiosyncraticCrisis = (): StressScenario => buildPresetScenario('idiosyncratic-crisis');

export const getAllPredefinedScenarios = (): StressScenario[] => scenarios.map((s) => createStressScenario(s.input));

/** Name → scenario lookup; names must be unique within the collection. */
export const indexScenariosByName = (collection: readonly StressScenario[]): Map<string, StressScenario> => {
  const index = new Map<string, StressScenario>();
  const duplicates: string[] = [];
  collection.forEach((scenario) => {
    if (index.has(scenario.name)) {
      duplicates.push(`Duplicate scenario name: ${scenario.name}`);
      return;
    }
    index.set(scenario.name, scenario);
  });
  if (duplicates.length > 0) {
    throw new ValidationError(duplicates);
  }
  return index;
};
