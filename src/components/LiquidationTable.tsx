import { AssetDepletionAnalysis } from '../domain/analysis';
import { AssetCategory } from '../domain/enums';
import { ASSET_META } from '../domain/productMeta';
import { formatMillions, formatPct } from '../utils/formatters';

interface Props {
  depletion: AssetDepletionAnalysis;
}

const LiquidationTable = ({ depletion }: Props) => {
  const rows = Object.values(AssetCategory).flatMap((asset) => {
    const entry = depletion[asset];
    return entry ? [{ asset, ...entry }] : [];
  });

  return (
    <div className="card">
      <h3>Asset liquidations</h3>
      {rows.length === 0 ? (
        <div className="muted">No assets were sold.</div>
      ) : (
        <table className="data-table">
          <thead>
            <tr>
              <th>Asset</th>
              <th className="numeric">Sold</th>
              <th className="numeric">Loss</th>
              <th className="numeric">Sales</th>
              <th className="numeric">Avg haircut</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((r) => (
              <tr key={r.asset}>
                <td>{ASSET_META[r.asset].label}</td>
                <td className="numeric">{formatMillions(r.totalSold)}</td>
                <td className="numeric">{formatMillions(r.totalLoss)}</td>
                <td className="numeric">{r.count}</td>
                <td className="numeric">{formatPct(r.avgHaircut, 1)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
};

export default LiquidationTable;
