export * from './pipeline';
export * from './intake';
export * from './strategy';
export * from './content';
export * from './hashtags';
export * from './visuals';
export * from './summary';
export * from './orchestrator';
export * from './export';
export { createLogger } from './log';
export type { Logger, LogLevel } from './log';
export {
  WEEKDAYS,
  DAY_NUMBERS,
  createSeededRandom,
  deriveDaySeed,
  scheduledDateFor,
  weekStartFor,
} from './planner';
export type { RandomSource, Clock, DayNumber, DayName } from './planner';
