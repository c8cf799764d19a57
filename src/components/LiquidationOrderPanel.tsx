import { LiquidationLabel, RecoveryAction } from '../domain/enums';

interface Props {
  order: LiquidationLabel[];
  onOrderChange: (order: LiquidationLabel[]) => void;
  recoveryActions: RecoveryAction[];
  onRecoveryActionsChange: (actions: RecoveryAction[]) => void;
}

const move = <T,>(items: T[], from: number, to: number): T[] => {
  if (to < 0 || to >= items.length) return items;
  const next = [...items];
  const [item] = next.splice(from, 1);
  next.splice(to, 0, item);
  return next;
};

const LiquidationOrderPanel = ({ order, onOrderChange, recoveryActions, onRecoveryActionsChange }: Props) => {
  const excluded = Object.values(LiquidationLabel).filter((label) => !order.includes(label));

  const toggleAction = (action: RecoveryAction) =>
    onRecoveryActionsChange(
      recoveryActions.includes(action) ? recoveryActions.filter((a) => a !== action) : [...recoveryActions, action]
    );

  return (
    <div className="card stack">
      <h3>Liquidation order</h3>
      <ol className="liquidation-order">
        {order.map((label, idx) => (
          <li key={label}>
            <span>{label}</span>
            <span className="button-group">
              <button className="button ghost small" type="button" onClick={() => onOrderChange(move(order, idx, idx - 1))}>
                Up
              </button>
              <button className="button ghost small" type="button" onClick={() => onOrderChange(move(order, idx, idx + 1))}>
                Down
              </button>
              <button
                className="button ghost small"
                type="button"
                onClick={() => onOrderChange(order.filter((l) => l !== label))}
              >
                Remove
              </button>
            </span>
          </li>
        ))}
      </ol>
      {excluded.length > 0 && (
        <div className="form-row">
          {excluded.map((label) => (
            <button key={label} className="button small" type="button" onClick={() => onOrderChange([...order, label])}>
              Add {label}
            </button>
          ))}
        </div>
      )}
      <fieldset>
        <legend>Recovery actions (recorded, not modelled)</legend>
        {Object.values(RecoveryAction).map((action) => (
          <label key={action} className="checkbox">
            <input type="checkbox" checked={recoveryActions.includes(action)} onChange={() => toggleAction(action)} />
            {action}
          </label>
        ))}
      </fieldset>
    </div>
  );
};

export default LiquidationOrderPanel;
