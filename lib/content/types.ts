import type { DayName, DayNumber } from '@/lib/planner';
import type { Platform } from '@/lib/intake';

// ============================================
// Content Types
// ============================================

/** The four independent sources a content type can be drawn from */
export interface ContentTypePools {
  platformTrends: string[];
  industryTrends: string[];
  goalPreferences: string[];
  audiencePreferences: string[];
}

export interface ContentTypeRecommendation {
  contentType: string;
  /** Number of pools the type appeared in */
  confidenceScore: number;
  rationale: string;
  optimalTiming: string;
  engagementPotential: string;
}

export interface ContentTypeRequest {
  day: number;
  platform: string;
}

// ============================================
// Daily Posts
// ============================================

export interface PlatformOptimization {
  bestPostingTimes: string;
  optimalLength: string;
  engagementTips: string;
  visualRecommendations: string;
}

export interface BrandAlignment {
  voice: string;
  tone: string;
  values: string;
}

export interface DailyPost {
  day: DayNumber;
  dayName: DayName;
  platform: Platform;
  goal: string;
  postType: string;
  title: string;
  caption: string;
  contentTheme: string;
  platformOptimization: PlatformOptimization;
  brandAlignment: BrandAlignment;
  targetAudience: string;
  /** yyyy-MM-dd of this weekday in the planned week */
  scheduledDate: string;
  timestamp: string;
}

export interface DailyPostRequest {
  day: number;
  theme: string;
  postType: string;
  platform: string;
  /** Defaults to the business profile's target audience */
  audience?: string;
  /** Defaults to the brand profile's voice */
  voice?: string;
}

// ============================================
// Calendar
// ============================================

export type Distribution = Record<string, number>;

export interface CalendarStatistics {
  contentTypeDistribution: Distribution;
  platformDistribution: Distribution;
  themeDistribution: Distribution;
  goalDistribution: Distribution;
  totalPosts: number;
  uniquePlatforms: number;
  uniqueThemes: number;
}

export interface PlatformSummary {
  totalPosts: number;
  contentTypes: Distribution;
  themes: Distribution;
  postingSchedule: Partial<Record<DayName, number>>;
}

export interface ThemeConsistency {
  goalDiversity: number;
  /** 1 when a theme serves at most two distinct goals, else 0.5 */
  consistencyScore: 1 | 0.5;
}

export interface ThemeAnalysis {
  themeFrequency: Distribution;
  themeGoals: Record<string, string[]>;
  themePlatforms: Record<string, Platform[]>;
  themeConsistency: Record<string, ThemeConsistency>;
}

export interface ImplementationGuide {
  preLaunchChecklist: string[];
  postingSchedule: {
    frequency: string;
    optimalTimes: Partial<Record<Platform, string>>;
    contentPreparation: string;
    engagementMonitoring: string;
  };
  qualityAssurance: string[];
  performanceTracking: string[];
}

export interface CalendarTableRow {
  day: DayName;
  platform: Platform;
  type: string;
  title: string;
  goal: string;
  theme: string;
}

export interface ContentCalendar {
  overview: {
    totalPosts: number;
    platformsCovered: Platform[];
    contentThemes: string[];
    calendarPeriod: string;
    weekStart: string;
    generatedAt: string;
  };
  businessContext: {
    industry: string;
    targetAudience: string;
    businessGoals: string;
    brandVoice: string;
    brandTone: string;
  };
  /** Always seven, ordered Monday to Sunday */
  dailyPosts: DailyPost[];
  statistics: CalendarStatistics;
  platformSummaries: Partial<Record<Platform, PlatformSummary>>;
  themeAnalysis: ThemeAnalysis;
  implementationGuide: ImplementationGuide;
  table: CalendarTableRow[];
  /** Days filled with a placeholder post */
  placeholderDays: DayNumber[];
}
