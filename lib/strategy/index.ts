export {
  buildStrategy,
  buildStrategyFramework,
  analyzeGoals,
  analyzeChallenges,
  selectThemes,
  recommendPostTypes,
  buildWeeklyStructure,
  recommendContentMix,
  defineSuccessMetrics,
} from './build-strategy';
export { GOAL_RULES, CHALLENGE_RULES, CONTENT_MIX, BASE_POST_TYPES } from './tables';

export type {
  GoalPriority,
  ChallengeSolution,
  FocusArea,
  ContentMixCategory,
  Theme,
  GoalsAnalysis,
  ChallengesAnalysis,
  WeeklySlot,
  WeeklyStructure,
  StrategyFramework,
} from './types';
