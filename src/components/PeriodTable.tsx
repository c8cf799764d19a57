import { PeriodRow } from '../types/statements';
import { formatMillions, formatPct, formatRatio } from '../utils/formatters';

interface Props {
  rows: PeriodRow[];
}

const PeriodTable = ({ rows }: Props) => (
  <div className="card">
    <h3>Period trace</h3>
    <table className="data-table">
      <thead>
        <tr>
          <th>Period</th>
          <th className="numeric">Outflow</th>
          <th className="numeric">Sold</th>
          <th className="numeric">Losses</th>
          <th className="numeric">Cash</th>
          <th className="numeric">LCR</th>
          <th className="numeric">CET1</th>
        </tr>
      </thead>
      <tbody>
        {rows.map((r) => (
          <tr key={r.period}>
            <td>{r.period}</td>
            <td className="numeric">{formatMillions(r.totalOutflow)}</td>
            <td className="numeric">{formatMillions(r.amountLiquidated)}</td>
            <td className="numeric">{formatMillions(r.losses + r.creditProvision)}</td>
            <td className="numeric">{formatMillions(r.closingCash)}</td>
            <td className="numeric">{formatRatio(r.lcr)}</td>
            <td className="numeric">{formatPct(r.cet1Ratio)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  </div>
);

export default PeriodTable;
