import { SummaryReport } from '../domain/analysis';
import { formatPct, formatRatio } from '../utils/formatters';

interface Props {
  report: SummaryReport;
}

const SurvivalReport = ({ report }: Props) => {
  const { breachAnalysis } = report;
  return (
    <div className="card stack">
      <div>
        <div className="eyebrow">{report.scenarioName}</div>
        <h3>Survival report</h3>
      </div>
      {breachAnalysis.breached ? (
        <div className={`notice severity-${breachAnalysis.severity.toLowerCase()}`}>
          <strong>
            {breachAnalysis.severity}: {breachAnalysis.type} breach at period {breachAnalysis.period}
          </strong>
          <p>{breachAnalysis.message}</p>
          <p className="muted">
            Value {formatRatio(breachAnalysis.value, 2)} against threshold {formatPct(breachAnalysis.threshold, 1)}
          </p>
        </div>
      ) : (
        <div className="notice ok">{breachAnalysis.message}</div>
      )}
      <dl className="summary-list">
        <dt>Primary driver</dt>
        <dd>{report.primaryDriver}</dd>
        <dt>Critical periods</dt>
        <dd>{report.criticalPeriods.length > 0 ? report.criticalPeriods.join(', ') : 'None'}</dd>
      </dl>
    </div>
  );
};

export default SurvivalReport;
