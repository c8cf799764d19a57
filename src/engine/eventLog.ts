import { EventListener, EventSeverity, SimulationEvent } from '../domain/events';

export interface EventLog {
  readonly events: SimulationEvent[];
  push(severity: EventSeverity, message: string, period?: number): SimulationEvent;
}

/**
 * Collects events for one run and forwards each to `onEvent` as it is pushed.
 *
 * Ids are sequence numbers scoped to the log (no clock), so two identical runs produce
 * identical event lists.
 */
export const createEventLog = (onEvent?: EventListener, prefix = 'evt'): EventLog => {
  const events: SimulationEvent[] = [];
  let sequence = 0;
  return {
    events,
    push: (severity, message, period) => {
      const event: SimulationEvent = {
        id: `${prefix}-${sequence++}`,
        severity,
        message,
        ...(period !== undefined ? { period } : {}),
      };
      events.push(event);
      onEvent?.(event);
      return event;
    },
  };
};
