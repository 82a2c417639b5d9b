// Seeded random number generator interface
export interface RandomSource {
  next(): number;
  nextInt(max: number): number;
  choice<T>(items: readonly T[]): T;
  shuffle<T>(array: readonly T[]): T[];
}

export type Clock = () => Date;

export type DayNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type DayName =
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday'
  | 'Sunday';
