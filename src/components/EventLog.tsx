import { EventSeverity, SimulationEvent } from '../domain/events';

interface Props {
  events: readonly SimulationEvent[];
}

const countBy = (events: readonly SimulationEvent[], severity: EventSeverity) =>
  events.filter((e) => e.severity === severity).length;

const EventLog = ({ events }: Props) => {
  const warnings = countBy(events, 'warning');
  const errors = countBy(events, 'error');

  return (
    <div className="card stack">
      <div className="card-header">
        <h3>Event Log</h3>
        {events.length > 0 && (
          <span className="muted">
            {events.length} events · {warnings} warnings · {errors} errors
          </span>
        )}
      </div>
      {events.length === 0 ? (
        <div className="muted">Run a scenario to see its event trail.</div>
      ) : (
        <ol className="event-log">
          {events.map((e) => (
            <li key={e.id} className={`event ${e.severity}`}>
              <span className="event-tag">{e.period === undefined ? '--' : `P${e.period}`}</span>
              <span className="event-severity">{e.severity.toUpperCase()}</span>
              <span className="event-message">{e.message}</span>
            </li>
          ))}
        </ol>
      )}
    </div>
  );
};

export default EventLog;
