import { AlertLevel } from '../domain/risks';
import { SimulationResult } from '../domain/simulation';
import { classifyMetricAlert } from '../engine/survivalAnalyzer';
import { formatInt, formatMillions, formatPct, formatRatio } from '../utils/formatters';

interface Props {
  result: SimulationResult;
}

const TopMetricsPanel = ({ result }: Props) => {
  const periodsRun = result.periods.length;
  return (
    <div className="grid-metrics">
      <Metric
        label="Survival Horizon"
        value={`${formatInt(result.survivalHorizon)} periods`}
        helper={result.breach ? `First breach at period ${result.breach.period}.` : 'No breach over the scenario.'}
        level={result.breach ? 'breach' : 'ok'}
      />
      <Metric label="Breach Type" value={result.breachType} helper={`${periodsRun} period(s) simulated.`} />
      <Metric
        label="Final LCR"
        value={formatRatio(result.finalLcr)}
        helper="HQLA over 30-day stressed net outflows (minimum 100%)."
        level={periodsRun > 0 ? classifyMetricAlert('lcr', result.finalLcr) : undefined}
      />
      <Metric
        label="Final CET1 Ratio"
        value={formatPct(result.finalCet1)}
        helper="CET1 capital over risk-weighted assets (minimum 4.5%)."
        level={periodsRun > 0 ? classifyMetricAlert('cet1', result.finalCet1) : undefined}
      />
      <Metric label="Asset Depletion" value={formatMillions(result.assetDepletion)} helper="Book value sold." />
      <Metric label="Total Losses" value={formatMillions(result.totalLosses)} helper="Haircut losses booked to CET1." />
      <Metric label="Capital Erosion" value={formatPct(result.capitalErosion)} helper="Losses over opening equity." />
    </div>
  );
};

const Metric = ({ label, value, helper, level }: { label: string; value: string; helper?: string; level?: AlertLevel }) => (
  <div className={level ? `metric-card alert-${level}` : 'metric-card'}>
    <div className="metric-label">{label}</div>
    <div className="metric-value">{value}</div>
    {helper && <div className="metric-helper">{helper}</div>}
  </div>
);

export default TopMetricsPanel;
