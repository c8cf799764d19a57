import { BalanceSheetRow } from '../domain/balanceSheet';
import { LedgerSection } from '../domain/enums';
import { formatMillions, formatPct } from '../utils/formatters';

interface Props {
  rows: BalanceSheetRow[];
}

const RowsTable = ({ rows }: Props) => (
  <table className="data-table">
    <thead>
      <tr>
        <th>Item</th>
        <th className="numeric">Amount</th>
        <th className="numeric">% of assets</th>
      </tr>
    </thead>
    <tbody>
      {rows.map((r) => (
        <tr key={r.item} className={r.section === 'total' ? 'total-row' : undefined}>
          <td>{r.item}</td>
          <td className="numeric">{formatMillions(r.amount)}</td>
          <td className="numeric">{formatPct(r.sharePct, 1)}</td>
        </tr>
      ))}
    </tbody>
  </table>
);

const BalanceSheetTable = ({ rows }: Props) => {
  // Rows arrive as assets, TOTAL ASSETS, liabilities, equity, TOTAL LIABILITIES + EQUITY.
  const split = rows.findIndex((r) => r.section === 'total') + 1;
  const assets = rows.slice(0, split);
  const funding = rows.slice(split);
  const hasEquity = funding.some((r) => r.section === LedgerSection.Equity);

  return (
    <div className="grid-two">
      <div className="card">
        <h3>Assets</h3>
        <RowsTable rows={assets} />
      </div>
      <div className="card">
        <h3>{hasEquity ? 'Liabilities & Equity' : 'Liabilities'}</h3>
        <RowsTable rows={funding} />
      </div>
    </div>
  );
};

export default BalanceSheetTable;
