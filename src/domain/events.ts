// Used by the dashboard to present what happened during a run.
export type EventSeverity = 'info' | 'warning' | 'error';

export interface SimulationEvent {
  id: string;
  severity: EventSeverity;
  message: string;
  period?: number;
}

export type EventListener = (event: SimulationEvent) => void;
