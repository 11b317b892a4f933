import { buildMessage, displayTime } from './message';
import { Notification } from './types';

const DOWN: Notification = {
  kind: 'DOWN',
  monitorName: 'demo',
  url: 'https://example.com/',
  timestamp: '2026-01-15T10:30:00.000Z',
  count: 4,
};

describe('displayTime', () => {
  it('should render ISO timestamps as UTC wall time', () => {
    expect(displayTime('2026-01-15T10:30:00.000Z')).toBe('2026-01-15 10:30:00 UTC');
  });

  it('should pass through unparseable values', () => {
    expect(displayTime('not-a-date')).toBe('not-a-date');
  });
});

describe('buildMessage', () => {
  it('should describe a DOWN notification', () => {
    expect(buildMessage(DOWN)).toEqual({
      subject: '[DOWN] https://example.com/ IS DOWN!',
      body: 'Alert! https://example.com/ is not responding.\n\n' +
        'Monitor: demo\n' +
        'Detected at: 2026-01-15 10:30:00 UTC\n' +
        'Consecutive failures: 4',
    });
  });

  it('should describe a RECOVERED notification', () => {
    expect(buildMessage({ ...DOWN, kind: 'RECOVERED', count: 7 })).toEqual({
      subject: '[RECOVERED] https://example.com/ is back online',
      body: 'Good news! https://example.com/ is back up and running.\n\n' +
        'Monitor: demo\n' +
        'Recovered at: 2026-01-15 10:30:00 UTC\n' +
        'Total failed checks: 7',
    });
  });
});
