import { BalanceSheet } from '../domain/balanceSheet';
import { RecoveryAction } from '../domain/enums';
import { EventListener } from '../domain/events';
import { StressScenario } from '../domain/scenario';
import { SimulationResult } from '../domain/simulation';
import { ScenarioPreset, buildPresetScenario, scenarios } from '../config/scenarios';
import { createLiquidityEngine, ProgressCallback } from '../engine/liquidityEngine';

export interface RunRequest {
  balanceSheet: BalanceSheet;
  scenario: StressScenario;
  liquidationOrder: readonly string[];
  recoveryActions?: readonly RecoveryAction[];
  onProgress?: ProgressCallback;
}

/**
 * What the dashboard holds: preset lookup, one engine per run, and the history of finished runs.
 * Errors from the engine propagate to the caller.
 */
export class SimulationController {
  private readonly history: SimulationResult[] = [];
  private readonly onEvent?: EventListener;

  constructor(onEvent?: EventListener) {
    this.onEvent = onEvent;
  }

  listPresets(): readonly ScenarioPreset[] {
    return scenarios;
  }

  buildPreset(id: string): StressScenario {
    return buildPresetScenario(id);
  }

  run({ balanceSheet, scenario, liquidationOrder, recoveryActions, onProgress }: RunRequest): SimulationResult {
    const engine = createLiquidityEngine({
      balanceSheet,
      scenario,
      liquidationOrder,
      recoveryActions,
      onEvent: this.onEvent,
    });
    const result = engine.run({ onProgress });
    this.history.push(result);
    return result;
  }

  getHistory(): readonly SimulationResult[] {
    return this.history;
  }

  getLatest(): SimulationResult | undefined {
    return this.history.length > 0 ? this.history[this.history.length - 1] : undefined;
  }

  clearHistory() {
    this.history.length = 0;
  }
}
