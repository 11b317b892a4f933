export type AvailabilityRating = 'EXCELLENT' | 'GREAT' | 'GOOD' | 'FAIR' | 'POOR';

export interface RatingBand {
  rating: AvailabilityRating;
  minPercent: number;
  description: string;
}

/** Checked in order; the first band whose minimum is met wins. */
export const RATING_BANDS: readonly RatingBand[] = [
  { rating: 'EXCELLENT', minPercent: 99.99, description: 'Four nines availability (99.99%+)' },
  { rating: 'GREAT', minPercent: 99.9, description: 'Three nines availability (99.9%+)' },
  { rating: 'GOOD', minPercent: 99, description: 'Two nines availability (99%+)' },
  { rating: 'FAIR', minPercent: 95, description: 'Below industry standard (95%+)' },
  { rating: 'POOR', minPercent: 0, description: 'Significant downtime detected' },
];

export function rateAvailability(percent: number): RatingBand {
  return RATING_BANDS.find(band => percent >= band.minPercent) ?? RATING_BANDS[RATING_BANDS.length - 1];
}
