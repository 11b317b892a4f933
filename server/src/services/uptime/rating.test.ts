import { rateAvailability } from './rating';

describe('rateAvailability', () => {
  it.each([
    [100, 'EXCELLENT'],
    [99.99, 'EXCELLENT'],
    [99.9899, 'GREAT'],
    [99.9, 'GREAT'],
    [99.5, 'GOOD'],
    [99, 'GOOD'],
    [98.9999, 'FAIR'],
    [95, 'FAIR'],
    [94.9999, 'POOR'],
    [0, 'POOR'],
  ])('should rate %p%% as %s', (percent, expected) => {
    expect(rateAvailability(percent).rating).toBe(expected);
  });

  it('should describe each band', () => {
    expect(rateAvailability(99.95).description).toBe('Three nines availability (99.9%+)');
    expect(rateAvailability(70).description).toBe('Significant downtime detected');
  });
});
