export { UptimeReporter, roundPercent } from './UptimeReporter';
export type { UptimeReport, UptimeStats, NoUptimeData } from './UptimeReporter';
export { rateAvailability, RATING_BANDS } from './rating';
export type { AvailabilityRating, RatingBand } from './rating';
export { formatReport } from './formatReport';
export { runUptimeCli, createPrompt } from './cli';
export type { CliIO } from './cli';
