export {
  assembleSummary,
  contentCreationTips,
  engagementStrategies,
  generateSummary,
  identifySuccessFactors,
  performanceTracking,
  summarizeCalendar,
  summarizeVisuals,
} from './summarize';

export type { SummaryInput } from './summarize';
export type {
  ExecutiveSummary,
  ContentStrategyOverview,
  ScheduledPostSummary,
  CalendarSummary,
  PerformanceTracking,
  ImplementationGuidance,
  NextSteps,
  StrategySummary,
  ScheduledVisualSummary,
  VisualDirection,
} from './types';
