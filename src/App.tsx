import { useMemo, useState } from 'react';
import { sampleBalanceSheet } from './config/sampleBalanceSheet';
import { DEFAULT_LIQUIDATION_ORDER } from './config/liquidation';
import { RISK_LIMITS } from './config/regulatory';
import { BalanceSheet } from './domain/balanceSheet';
import { LedgerSection, LineItemKey, LiquidationLabel, RecoveryAction } from './domain/enums';
import { UnknownCategoryError, ValidationError } from './domain/errors';
import { SimulationEvent } from './domain/events';
import { ASSET_META, EQUITY_META, LIABILITY_META } from './domain/productMeta';
import { BalanceSheetInput } from './domain/schemas';
import { SimulationResult } from './domain/simulation';
import { balanceSheetFromRecord, toBalanceSheetRows, validateBalanceSheet } from './engine/balanceSheet';
import { calculateAllMetrics } from './engine/metrics';
import { toPeriodRows } from './engine/periodRows';
import { generateSummaryReport, getMetricsTrajectory } from './engine/survivalAnalyzer';
import { SimulationController } from './ui/simulationController';
import BalanceSheetEditor, { BalanceSheetDraft } from './components/BalanceSheetEditor';
import BalanceSheetTable from './components/BalanceSheetTable';
import EventLog from './components/EventLog';
import LiquidationOrderPanel from './components/LiquidationOrderPanel';
import LiquidationTable from './components/LiquidationTable';
import PeriodTable from './components/PeriodTable';
import ScenarioSelector from './components/ScenarioSelector';
import SurvivalReport from './components/SurvivalReport';
import TimeSeriesChart from './components/TimeSeriesChart';
import TopMetricsPanel from './components/TopMetricsPanel';
import { formatMillions, formatPct, formatRatio } from './utils/formatters';

const controller = new SimulationController();
const tabs = ['Overview', 'Balance Sheet', 'Liquidations', 'Events'];

const toDraft = (input: BalanceSheetInput): BalanceSheetDraft => {
  const draft: BalanceSheetDraft = { assets: {}, liabilities: {}, equity: {} };
  Object.values(ASSET_META).forEach((m) => {
    draft.assets[m.key] = input.assets[m.key]?.toString() ?? '';
  });
  Object.values(LIABILITY_META).forEach((m) => {
    draft.liabilities[m.key] = input.liabilities[m.key]?.toString() ?? '';
  });
  Object.values(EQUITY_META).forEach((m) => {
    draft.equity[m.key] = input.equity[m.key]?.toString() ?? '';
  });
  return draft;
};

// Blank fields are left out; anything else goes to the schema as a number.
const fromDraft = (draft: BalanceSheetDraft): Record<LedgerSection, Record<string, number>> => {
  const section = (values: Partial<Record<LineItemKey, string>>) =>
    Object.fromEntries(
      Object.entries(values)
        .filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== '')
        .map(([key, value]) => [key, Number(value)])
    );
  return {
    assets: section(draft.assets),
    liabilities: section(draft.liabilities),
    equity: section(draft.equity),
  };
};

const describeError = (error: unknown): string[] => {
  if (error instanceof ValidationError) return error.issues;
  if (error instanceof UnknownCategoryError) return [error.message];
  throw error;
};

const App = () => {
  const [draft, setDraft] = useState<BalanceSheetDraft>(() => toDraft(sampleBalanceSheet));
  const [selectedScenarioId, setSelectedScenarioId] = useState<string | null>(controller.listPresets()[0]?.id ?? null);
  const [order, setOrder] = useState<LiquidationLabel[]>([...DEFAULT_LIQUIDATION_ORDER]);
  const [recoveryActions, setRecoveryActions] = useState<RecoveryAction[]>([]);
  const [result, setResult] = useState<SimulationResult | null>(null);
  const [errors, setErrors] = useState<string[]>([]);
  const [activeTab, setActiveTab] = useState<string>('Overview');

  const parsed = useMemo((): { bs: BalanceSheet | null; issues: string[]; warnings: SimulationEvent[] } => {
    try {
      const bs = balanceSheetFromRecord(fromDraft(draft));
      const warnings: SimulationEvent[] = [];
      try {
        validateBalanceSheet(bs, (e) => warnings.push(e));
        return { bs, issues: [], warnings };
      } catch (integrityError) {
        // An out-of-balance ledger can still be stressed; show the problem next to the table.
        return { bs, issues: describeError(integrityError), warnings };
      }
    } catch (error) {
      return { bs: null, issues: describeError(error), warnings: [] };
    }
  }, [draft]);

  const openingMetrics = useMemo(() => (parsed.bs ? calculateAllMetrics(parsed.bs) : null), [parsed.bs]);
  const report = useMemo(() => (result ? generateSummaryReport(result) : null), [result]);
  const trajectory = useMemo(() => (result ? getMetricsTrajectory(result) : null), [result]);

  const handleDraftChange = (section: LedgerSection, key: LineItemKey, value: string) =>
    setDraft((prev) => ({ ...prev, [section]: { ...prev[section], [key]: value } }));

  const handleRun = () => {
    if (!parsed.bs || !selectedScenarioId) return;
    try {
      const scenario = controller.buildPreset(selectedScenarioId);
      setResult(
        controller.run({ balanceSheet: parsed.bs, scenario, liquidationOrder: order, recoveryActions })
      );
      setErrors([]);
    } catch (error) {
      setErrors(describeError(error));
    }
  };

  return (
    <div className="app-shell">
      <header className="hero">
        <div className="hero-content">
          <div className="eyebrow">Liquidity stress lab</div>
          <h1>Bank Survival Simulator</h1>
          <p className="muted">
            Apply deposit run-off, fire-sale liquidations and credit deterioration period by period until a regulatory
            threshold breaks.
          </p>
          <div className="hero-pills">
            <span className="pill">Runs {controller.getHistory().length}</span>
            {result && (
              <span className={`pill ${result.breach ? 'danger' : 'success'}`}>
                {result.breach ? `${result.breachType} breach` : 'Survived'}
              </span>
            )}
          </div>
        </div>
        {openingMetrics && (
          <div className="hero-side">
            <div className="hero-pills" style={{ justifyContent: 'flex-end' }}>
              <span className="pill">Assets {formatMillions(openingMetrics.totalAssets)}</span>
              <span className="pill">LCR {formatRatio(openingMetrics.lcr)}</span>
              <span className="pill">NSFR {formatRatio(openingMetrics.nsfr)}</span>
              <span className="pill">CET1 {formatPct(openingMetrics.cet1Ratio)}</span>
            </div>
          </div>
        )}
      </header>

      {errors.length > 0 && (
        <div className="alert danger">
          <ul>
            {errors.map((e) => (
              <li key={e}>{e}</li>
            ))}
          </ul>
        </div>
      )}

      <div className="tabs">
        {tabs.map((tab) => (
          <button
            key={tab}
            onClick={() => setActiveTab(tab)}
            className={`tab-button ${activeTab === tab ? 'active' : ''}`}
          >
            {tab}
          </button>
        ))}
      </div>

      {activeTab === 'Overview' && (
        <div className="stack">
          <ScenarioSelector
            presets={controller.listPresets()}
            selectedId={selectedScenarioId}
            onSelect={setSelectedScenarioId}
            onRun={handleRun}
            running={!parsed.bs}
          />
          {result && report && trajectory ? (
            <>
              <TopMetricsPanel result={result} />
              <SurvivalReport report={report} />
              <div className="grid-two">
                <div className="card">
                  <h3>LCR</h3>
                  <TimeSeriesChart
                    data={trajectory.lcr}
                    yLabel="LCR %"
                    threshold={RISK_LIMITS.minLcr}
                    breachPeriod={result.breach?.period}
                  />
                </div>
                <div className="card">
                  <h3>CET1 ratio</h3>
                  <TimeSeriesChart
                    data={trajectory.cet1Ratio}
                    yLabel="CET1 %"
                    threshold={RISK_LIMITS.minCet1Ratio}
                    breachPeriod={result.breach?.period}
                  />
                </div>
                <div className="card">
                  <h3>Liquid assets</h3>
                  <TimeSeriesChart data={trajectory.liquidAssets} yLabel="Liquid assets" />
                </div>
                <div className="card">
                  <h3>Deposits</h3>
                  <TimeSeriesChart data={trajectory.totalDeposits} yLabel="Deposits" />
                </div>
              </div>
            </>
          ) : (
            <div className="card muted">Pick a scenario and run it to see the survival horizon.</div>
          )}
        </div>
      )}

      {activeTab === 'Balance Sheet' && (
        <div className="stack">
          {parsed.issues.length > 0 && (
            <div className="alert warning">
              <ul>
                {parsed.issues.map((issue) => (
                  <li key={issue}>{issue}</li>
                ))}
              </ul>
            </div>
          )}
          <BalanceSheetEditor draft={draft} onChange={handleDraftChange} />
          {parsed.bs && <BalanceSheetTable rows={toBalanceSheetRows(parsed.bs)} />}
          {parsed.warnings.length > 0 && <EventLog events={parsed.warnings} />}
        </div>
      )}

      {activeTab === 'Liquidations' && (
        <div className="stack">
          <LiquidationOrderPanel
            order={order}
            onOrderChange={setOrder}
            recoveryActions={recoveryActions}
            onRecoveryActionsChange={setRecoveryActions}
          />
          {report && <LiquidationTable depletion={report.assetDepletion} />}
          {result && <PeriodTable rows={toPeriodRows(result.periods)} />}
        </div>
      )}

      {activeTab === 'Events' && <EventLog events={result?.events ?? []} />}
    </div>
  );
};

export default App;
