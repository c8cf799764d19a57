import { describe, expect, it } from 'vitest';
import { AssetCategory, EquityCategory, LedgerSection, LiabilityCategory } from '../domain/enums';
import { createBalanceSheet, toBalanceSheetRows } from '../engine/balanceSheet';
import BalanceSheetTable from './BalanceSheetTable';
import { render } from './testFixtures';

describe('BalanceSheetTable', () => {
  const rows = toBalanceSheetRows(
    createBalanceSheet({
      assets: { [AssetCategory.CashReserves]: 600, [AssetCategory.PerformingLoans]: 400 },
      liabilities: { [LiabilityCategory.RetailStable]: 900 },
      equity: { [EquityCategory.Cet1]: 100 },
    })
  );

  it('splits assets from funding at the first total row', () => {
    const html = render(<BalanceSheetTable rows={rows} />);
    expect(html).toContain('<h3>Assets</h3>');
    expect(html).toContain('<h3>Liabilities &amp; Equity</h3>');
    expect(html.match(/class="total-row"/g)).toHaveLength(2);
  });

  it('formats amounts and shares', () => {
    const html = render(<BalanceSheetTable rows={rows} />);
    expect(html).toContain(
      '<tr><td>Cash &amp; central bank reserves</td><td class="numeric">$600.0M</td><td class="numeric">60.0%</td></tr>'
    );
    expect(html).toContain(
      '<tr class="total-row"><td>TOTAL ASSETS</td><td class="numeric">$1,000.0M</td><td class="numeric">100.0%</td></tr>'
    );
  });

  it('drops the equity heading when there is no equity row', () => {
    const html = render(<BalanceSheetTable rows={rows.filter((r) => r.section !== LedgerSection.Equity)} />);
    expect(html).toContain('<h3>Liabilities</h3>');
  });
});
