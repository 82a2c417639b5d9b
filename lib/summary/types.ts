import type { DayName } from '@/lib/planner';
import type { Platform } from '@/lib/intake';
import type { ContentMixCategory, WeeklyStructure } from '@/lib/strategy';
import type { Distribution } from '@/lib/content';
import type { BrandPalette } from '@/lib/visuals';

// ============================================
// Executive Summary
// ============================================

export interface ExecutiveSummary {
  businessOverview: {
    industry: string;
    targetAudience: string;
    primaryGoals: string;
    keyChallenges: string;
  };
  brandIdentity: {
    voice: string;
    tone: string;
    coreValues: string;
  };
  platformStrategy: {
    selectedPlatforms: Platform[];
    platformPriorities: string;
  };
}

export interface ContentStrategyOverview {
  primaryThemes: string[];
  contentMix: Record<ContentMixCategory, number>;
  weeklyStructure: WeeklyStructure;
}

// ============================================
// Calendar Summary
// ============================================

export interface ScheduledPostSummary {
  platform: Platform;
  title: string;
  type: string;
  goal: string;
}

export interface CalendarSummary {
  totalPosts: number;
  platformDistribution: Distribution;
  contentTypeDistribution: Distribution;
  postingSchedule: Partial<Record<DayName, ScheduledPostSummary>>;
}

// ============================================
// Implementation
// ============================================

export interface PerformanceTracking {
  keyMetrics: string[];
  trackingFrequency: string;
  toolsRecommended: string[];
  successBenchmarks: Record<string, string>;
}

export interface ImplementationGuidance {
  keySuccessFactors: string[];
  contentCreationTips: string[];
  engagementStrategies: Partial<Record<Platform, string[]>>;
  performanceTracking: PerformanceTracking;
}

export interface NextSteps {
  immediateActions: string[];
  ongoingActivities: string[];
}

// ============================================
// Visual Direction
// ============================================

export interface ScheduledVisualSummary {
  approach: string;
  dimensions: string;
  layout: string;
}

export interface VisualDirection {
  styleDirection: string;
  palette: BrandPalette;
  typography: string;
  conceptsByDay: Partial<Record<DayName, ScheduledVisualSummary>>;
}

export interface StrategySummary {
  executiveSummary: ExecutiveSummary;
  contentStrategyOverview: ContentStrategyOverview;
  calendarSummary: CalendarSummary;
  implementationGuidance: ImplementationGuidance;
  nextSteps: NextSteps;
  /** Present once brand visuals have been analyzed */
  visualDirection?: VisualDirection;
}
