import { LedgerSection, LineItemKey } from '../domain/enums';
import { ASSET_META, EQUITY_META, LIABILITY_META, LineItemMetadata } from '../domain/productMeta';

export type BalanceSheetDraft = Record<LedgerSection, Partial<Record<LineItemKey, string>>>;

interface Props {
  draft: BalanceSheetDraft;
  onChange: (section: LedgerSection, key: LineItemKey, value: string) => void;
}

const sectionMeta: Array<[LedgerSection, string, LineItemMetadata[]]> = [
  [LedgerSection.Assets, 'Assets', Object.values(ASSET_META)],
  [LedgerSection.Liabilities, 'Liabilities', Object.values(LIABILITY_META)],
  [LedgerSection.Equity, 'Equity', Object.values(EQUITY_META)],
];

const BalanceSheetEditor = ({ draft, onChange }: Props) => (
  <div className="card stack">
    <h3>Opening balance sheet ($M)</h3>
    <div className="grid-three">
      {sectionMeta.map(([section, title, metas]) => (
        <fieldset key={section}>
          <legend>{title}</legend>
          {metas.map((meta) => (
            <div className="field" key={meta.key}>
              <label htmlFor={`${section}-${meta.key}`}>{meta.label}</label>
              <input
                id={`${section}-${meta.key}`}
                type="number"
                min={0}
                value={draft[section][meta.key] ?? ''}
                onChange={(e) => onChange(section, meta.key, e.target.value)}
              />
            </div>
          ))}
        </fieldset>
      ))}
    </div>
  </div>
);

export default BalanceSheetEditor;
