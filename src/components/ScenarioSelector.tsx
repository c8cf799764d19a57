import { ScenarioPreset } from '../config/scenarios';

interface Props {
  presets: readonly ScenarioPreset[];
  selectedId: string | null;
  onSelect: (id: string) => void;
  onRun: () => void;
  running?: boolean;
}

const ScenarioSelector = ({ presets, selectedId, onSelect, onRun, running = false }: Props) => {
  const selected = presets.find((p) => p.id === selectedId);
  return (
    <div className="card scenario-card">
      <div>
        <div className="eyebrow">Scenario</div>
        <h3>Stress the balance sheet</h3>
      </div>
      <div className="form-row" style={{ alignItems: 'flex-end' }}>
        <div className="field">
          <label htmlFor="scenario">Choose a scenario</label>
          <select id="scenario" value={selectedId ?? ''} onChange={(e) => onSelect(e.target.value)}>
            <option value="" disabled>
              Select scenario...
            </option>
            {presets.map((p) => (
              <option key={p.id} value={p.id}>
                {p.name}
              </option>
            ))}
          </select>
        </div>
        <button className="button primary" onClick={onRun} disabled={!selectedId || running}>
          Run simulation
        </button>
      </div>
      {selected && (
        <p className="muted">
          {selected.description} ({selected.input.numPeriods} {selected.input.timeGranularity.toLowerCase()} periods)
        </p>
      )}
    </div>
  );
};

export default ScenarioSelector;
