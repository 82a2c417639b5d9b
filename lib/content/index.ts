export {
  rankContentTypes,
  gatherContentTypePools,
  industryTrendsFor,
  goalPreferencesFor,
  audiencePreferencesFor,
  resolveDayAndPlatform,
  recommendContentTypes,
} from './content-types';
export {
  assembleDailyPost,
  buildTemplateContext,
  choosePostType,
  formatCaption,
  generateDailyPost,
  planDailyPosts,
  platformForDay,
  resolveGoal,
} from './daily-post';
export {
  PLACEHOLDER_THEME,
  analyzeThemes,
  assembleCalendar,
  buildCalendar,
  buildCalendarTable,
  buildImplementationGuide,
  calculateStatistics,
  collectWeek,
  createPlaceholderPost,
  isPlaceholderPost,
  summarizePlatforms,
} from './calendar';

export type { DailyPostOptions, PlanDailyPostsOptions, AssembleInput, AssembleContext } from './daily-post';
export type { CalendarOptions } from './calendar';
export type {
  ContentTypePools,
  ContentTypeRecommendation,
  ContentTypeRequest,
  PlatformOptimization,
  BrandAlignment,
  DailyPost,
  DailyPostRequest,
  Distribution,
  CalendarStatistics,
  PlatformSummary,
  ThemeConsistency,
  ThemeAnalysis,
  ImplementationGuide,
  CalendarTableRow,
  ContentCalendar,
} from './types';
