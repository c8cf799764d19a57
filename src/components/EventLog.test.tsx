import { describe, expect, it } from 'vitest';
import EventLog from './EventLog';
import { render } from './testFixtures';

describe('EventLog', () => {
  it('shows a placeholder before any run', () => {
    expect(render(<EventLog events={[]} />)).toContain('<div class="muted">Run a scenario to see its event trail.</div>');
  });

  it('tags each line with its period and severity', () => {
    const html = render(
      <EventLog
        events={[
          { id: 'evt-0', severity: 'info', message: 'Starting simulation: Test (3 periods)' },
          { id: 'evt-1', severity: 'warning', message: 'Skipped unknown liquidation label Gold' },
          { id: 'evt-2', severity: 'error', message: 'LCR breach at period 2: 80.00 vs threshold 100', period: 2 },
        ]}
      />
    );
    expect(html).toContain('<span class="muted">3 events · 1 warnings · 1 errors</span>');
    expect(html).toContain(
      '<li class="event info"><span class="event-tag">--</span><span class="event-severity">INFO</span>' +
        '<span class="event-message">Starting simulation: Test (3 periods)</span></li>'
    );
    expect(html).toContain(
      '<li class="event error"><span class="event-tag">P2</span><span class="event-severity">ERROR</span>' +
        '<span class="event-message">LCR breach at period 2: 80.00 vs threshold 100</span></li>'
    );
  });
});
