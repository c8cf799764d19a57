/**
 * Period-stepping liquidity stress engine.
 *
 * Each period: deposit run-off, liquidation in the caller's order, credit deterioration every
 * tenth period, metrics, then breach checks (LCR, then CET1, then cash exhaustion). The run stops
 * at the first breach; that period's record is kept.
 */
import { BalanceSheet, LiquidationEvent } from '../domain/balanceSheet';
import { AssetCategory, BreachType, LiabilityCategory, RecoveryAction } from '../domain/enums';
import { EventListener } from '../domain/events';
import { CreditDeteriorationImpact, StressScenario } from '../domain/scenario';
import { BreachInfo, EngineState, MetricsSnapshot, PeriodRecord, SimulationResult } from '../domain/simulation';
import { CREDIT_DETERIORATION_INTERVAL, RISK_LIMITS } from '../config/regulatory';
import {
  BASE_LIQUIDATION_HAIRCUTS,
  DEFAULT_BASE_HAIRCUT,
  FIRE_SALE_EXEMPT,
  isLiquidationLabel,
  LIQUIDATION_LABELS,
  RUNOFF_CATEGORIES,
} from '../config/liquidation';
import { applyWithdrawal, liquidateAsset, totalEquity, totalLiquidAssets } from './balanceSheet';
import { cloneBalanceSheet } from './clone';
import { createEventLog, EventLog } from './eventLog';
import { calculateMetricsSnapshot } from './metrics';
import { applyCreditDeterioration, getRunoffForPeriod } from './stressScenario';

// Remaining outflow below this is treated as met.
export const OUTFLOW_EPSILON = 1e-9;

export type ProgressCallback = (period: number, status: string) => void;

export interface LiquidityEngineOptions {
  balanceSheet: BalanceSheet;
  scenario: StressScenario;
  // Asset-class labels such as 'Cash' or 'HQLA Level 1'; unknown labels are skipped.
  liquidationOrder: readonly string[];
  // Recorded on the result only.
  recoveryActions?: readonly RecoveryAction[];
  onEvent?: EventListener;
}

export interface RunOptions {
  onProgress?: ProgressCallback;
}

export interface LiquidityEngine {
  readonly state: EngineState;
  readonly periodResults: readonly PeriodRecord[];
  run(options?: RunOptions): SimulationResult;
}

/** Base haircut plus the scenario's fire-sale discount; cash and level-1 HQLA carry no fire-sale add-on. */
export const getLiquidationHaircut = (scenario: StressScenario, asset: AssetCategory): number => {
  const base = BASE_LIQUIDATION_HAIRCUTS[asset] ?? DEFAULT_BASE_HAIRCUT;
  return FIRE_SALE_EXEMPT.has(asset) ? base : base + scenario.fireSaleDiscount;
};

interface WithdrawalStep {
  outflows: Partial<Record<LiabilityCategory, number>>;
  totalOutflow: number;
}

const applyWithdrawals = (bs: BalanceSheet, scenario: StressScenario, period: number): WithdrawalStep => {
  const outflows: Partial<Record<LiabilityCategory, number>> = {};
  let totalOutflow = 0;
  RUNOFF_CATEGORIES.forEach((category) => {
    const opening = bs.liabilities[category] ?? 0;
    if (opening <= 0) return;
    const withdrawn = applyWithdrawal(bs, category, getRunoffForPeriod(scenario, period, category, opening));
    outflows[category] = withdrawn;
    totalOutflow += withdrawn;
  });
  return { outflows, totalOutflow };
};

interface FundingStep {
  liquidations: LiquidationEvent[];
  residualCashDrawn: number;
  losses: number;
}

// Proceeds land in cash; only the part the liquidation order could not cover is paid out of cash.
const meetOutflow = (
  bs: BalanceSheet,
  scenario: StressScenario,
  order: readonly AssetCategory[],
  outflow: number
): FundingStep => {
  const liquidations: LiquidationEvent[] = [];
  let remaining = outflow;
  let losses = 0;

  for (const asset of order) {
    if (remaining <= OUTFLOW_EPSILON) break;
    const available = bs.assets[asset] ?? 0;
    if (available <= 0) continue;
    const haircut = getLiquidationHaircut(scenario, asset);
    if (haircut >= 100) continue;
    const amount = Math.min(remaining / (1 - haircut / 100), available);
    if (amount <= 0) continue;
    const event = liquidateAsset(bs, asset, amount, haircut);
    liquidations.push(event);
    losses += event.loss;
    remaining -= event.proceeds;
  }

  let residualCashDrawn = 0;
  if (remaining > OUTFLOW_EPSILON) {
    const cash = bs.assets[AssetCategory.CashReserves] ?? 0;
    residualCashDrawn = Math.max(0, Math.min(remaining, cash));
    bs.assets[AssetCategory.CashReserves] = cash - residualCashDrawn;
  }

  return { liquidations, residualCashDrawn, losses };
};

export const detectBreach = (bs: BalanceSheet, metrics: MetricsSnapshot, period: number): BreachInfo | null => {
  if (metrics.lcr < RISK_LIMITS.minLcr) {
    return { type: BreachType.LCR, value: metrics.lcr, threshold: RISK_LIMITS.minLcr, period };
  }
  if (metrics.cet1Ratio < RISK_LIMITS.minCet1Ratio) {
    return { type: BreachType.CET1, value: metrics.cet1Ratio, threshold: RISK_LIMITS.minCet1Ratio, period };
  }
  if ((bs.assets[AssetCategory.CashReserves] ?? 0) <= 0 && totalLiquidAssets(bs) <= 0) {
    return { type: BreachType.Liquidity, value: 0, threshold: 0, period };
  }
  return null;
};

const resolveOrder = (labels: readonly string[], log: EventLog): AssetCategory[] => {
  const skipped = new Set<string>();
  const order: AssetCategory[] = [];
  labels.forEach((label) => {
    if (isLiquidationLabel(label)) {
      order.push(LIQUIDATION_LABELS[label]);
      return;
    }
    if (!skipped.has(label)) {
      skipped.add(label);
      log.push('warning', `Skipped unknown liquidation label "${label}"`);
    }
  });
  return order;
};

const compileResult = (
  scenario: StressScenario,
  initial: BalanceSheet,
  periods: PeriodRecord[],
  breach: BreachInfo | null,
  recoveryActions: RecoveryAction[],
  log: EventLog
): SimulationResult => {
  const assetDepletion = periods.reduce(
    (sum, p) => sum + p.liquidations.reduce((inner, l) => inner + l.amountLiquidated, 0),
    0
  );
  const totalLosses = periods.reduce((sum, p) => sum + p.losses, 0);
  const initialEquity = totalEquity(initial);
  const last = periods.length > 0 ? periods[periods.length - 1] : undefined;

  return {
    scenarioName: scenario.name,
    survivalHorizon: breach ? breach.period : scenario.numPeriods,
    breachType: breach ? breach.type : 'None',
    breach,
    assetDepletion,
    totalLosses,
    capitalErosion: initialEquity > 0 ? (totalLosses / initialEquity) * 100 : 0,
    finalLcr: last?.metrics.lcr ?? 0,
    finalCet1: last?.metrics.cet1Ratio ?? 0,
    periods: [...periods],
    recoveryActions,
    events: log.events,
  };
};

/**
 * Builds an engine over a private copy of `balanceSheet`. Every `run` starts again from that
 * copy, so a run is repeatable and never touches the caller's ledger.
 */
export const createLiquidityEngine = ({
  balanceSheet,
  scenario,
  liquidationOrder,
  recoveryActions = [],
  onEvent,
}: LiquidityEngineOptions): LiquidityEngine => {
  const initial = cloneBalanceSheet(balanceSheet);
  const labels = [...liquidationOrder];
  const actions = [...recoveryActions];
  let state: EngineState = { phase: 'initialized' };
  let periodResults: PeriodRecord[] = [];

  const run = ({ onProgress }: RunOptions = {}): SimulationResult => {
    const log = createEventLog(onEvent);
    const bs = cloneBalanceSheet(initial);
    log.push('info', `Starting simulation: ${scenario.name} (${scenario.numPeriods} periods)`);
    const order = resolveOrder(labels, log);
    periodResults = [];
    let breach: BreachInfo | null = null;

    for (let period = 0; period < scenario.numPeriods; period += 1) {
      state = { phase: 'running', period };
      const openingBalanceSheet = cloneBalanceSheet(bs);
      const { outflows, totalOutflow } = applyWithdrawals(bs, scenario, period);
      const funding = meetOutflow(bs, scenario, order, totalOutflow);

      let creditImpact: CreditDeteriorationImpact | undefined;
      if (period > 0 && period % CREDIT_DETERIORATION_INTERVAL === 0) {
        creditImpact = applyCreditDeterioration(scenario, bs);
        log.push(
          'info',
          `Credit deterioration: ${creditImpact.migrationAmount.toFixed(2)} migrated to NPL, ` +
            `${creditImpact.provision.toFixed(2)} provisioned`,
          period
        );
      }

      const metrics = calculateMetricsSnapshot(bs);
      periodResults.push({
        period,
        openingBalanceSheet,
        closingBalanceSheet: cloneBalanceSheet(bs),
        outflows,
        totalOutflow,
        liquidations: funding.liquidations,
        residualCashDrawn: funding.residualCashDrawn,
        losses: funding.losses,
        metrics,
        ...(creditImpact ? { creditImpact } : {}),
      });

      breach = detectBreach(bs, metrics, period);
      const status = breach ? `${breach.type} breach at period ${period}` : `Period ${period + 1}/${scenario.numPeriods}`;
      onProgress?.(period, status);
      if (breach) {
        log.push(
          'error',
          `${breach.type} breach at period ${period}: ${breach.value.toFixed(2)} vs threshold ${breach.threshold}`,
          period
        );
        break;
      }
    }

    state = breach ? { phase: 'breached', breach } : { phase: 'completed' };
    const result = compileResult(scenario, initial, periodResults, breach, [...actions], log);
    log.push('info', `Simulation completed: survival horizon ${result.survivalHorizon} periods`);
    return result;
  };

  return {
    get state() {
      return state;
    },
    get periodResults() {
      return periodResults;
    },
    run,
  };
};

/** One-shot convenience around `createLiquidityEngine(...).run()`. */
export const runSimulation = (options: LiquidityEngineOptions, runOptions?: RunOptions): SimulationResult =>
  createLiquidityEngine(options).run(runOptions);
