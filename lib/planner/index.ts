export { createSeededRandom, stringToSeed, toSeed, deriveDaySeed } from './random';
export {
  WEEKDAYS,
  DAY_NUMBERS,
  isDayNumber,
  dayName,
  weekStartFor,
  parseWeekStart,
  scheduledDateFor,
  formatWeekStart,
} from './week';

export type { RandomSource, Clock, DayNumber, DayName } from './types';
