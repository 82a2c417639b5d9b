import {
  DAY_NUMBERS,
  dayName,
  parseWeekStart,
  scheduledDateFor,
  weekStartFor,
  formatWeekStart,
  type Clock,
  type DayNumber,
} from '@/lib/planner';
import { postKey, runStage, type ContextStore, type StageResult } from '@/lib/pipeline';
import type { BrandProfile, BusinessProfile, Platform, PlatformSelection } from '@/lib/intake';
import type {
  CalendarStatistics,
  CalendarTableRow,
  ContentCalendar,
  DailyPost,
  Distribution,
  ImplementationGuide,
  PlatformSummary,
  ThemeAnalysis,
} from './types';
import { PLATFORM_OPTIMIZATION } from './templates';

export const PLACEHOLDER_THEME = 'General Content';

const PLACEHOLDER_PLATFORM: Platform = 'Instagram';

const OPTIMAL_POSTING_TIMES: Record<Platform, string> = {
  Facebook: '9 AM - 3 PM, Tuesday-Thursday',
  Instagram: '11 AM - 1 PM, 5 PM - 7 PM, Monday-Friday',
  LinkedIn: '8 AM - 10 AM, 12 PM - 2 PM, Tuesday-Thursday',
};

const TITLE_LIMIT = 50;
const GOAL_LIMIT = 30;

export interface CalendarOptions {
  clock?: Clock;
  /** Used when no generated post pins the week */
  weekStart?: Date;
}

export function isPlaceholderPost(post: DailyPost): boolean {
  return post.contentTheme === PLACEHOLDER_THEME;
}

/**
 * Default post for a day that was never generated
 */
export function createPlaceholderPost(
  day: DayNumber,
  brand: BrandProfile,
  weekStart: Date,
  now: Date
): DailyPost {
  return {
    day,
    dayName: dayName(day),
    platform: PLACEHOLDER_PLATFORM,
    goal: 'Increase audience engagement',
    postType: 'Image Post',
    title: `Day ${day} Content`,
    caption: 'Content placeholder - please generate specific content for this day.',
    contentTheme: PLACEHOLDER_THEME,
    platformOptimization: { ...PLATFORM_OPTIMIZATION[PLACEHOLDER_PLATFORM] },
    brandAlignment: { voice: brand.voice, tone: brand.tone, values: brand.coreValues },
    targetAudience: 'General audience',
    scheduledDate: scheduledDateFor(weekStart, day),
    timestamp: now.toISOString(),
  };
}

function increment(distribution: Distribution, key: string): void {
  distribution[key] = (distribution[key] ?? 0) + 1;
}

export function calculateStatistics(posts: readonly DailyPost[]): CalendarStatistics {
  const contentTypeDistribution: Distribution = {};
  const platformDistribution: Distribution = {};
  const themeDistribution: Distribution = {};
  const goalDistribution: Distribution = {};

  for (const post of posts) {
    increment(contentTypeDistribution, post.postType);
    increment(platformDistribution, post.platform);
    increment(themeDistribution, post.contentTheme);
    increment(goalDistribution, post.goal);
  }

  return {
    contentTypeDistribution,
    platformDistribution,
    themeDistribution,
    goalDistribution,
    totalPosts: posts.length,
    uniquePlatforms: Object.keys(platformDistribution).length,
    uniqueThemes: Object.keys(themeDistribution).length,
  };
}

export function summarizePlatforms(
  posts: readonly DailyPost[]
): Partial<Record<Platform, PlatformSummary>> {
  const summaries: Partial<Record<Platform, PlatformSummary>> = {};

  for (const post of posts) {
    const summary = summaries[post.platform] ?? {
      totalPosts: 0,
      contentTypes: {},
      themes: {},
      postingSchedule: {},
    };
    summary.totalPosts += 1;
    summary.postingSchedule[post.dayName] = (summary.postingSchedule[post.dayName] ?? 0) + 1;
    increment(summary.contentTypes, post.postType);
    increment(summary.themes, post.contentTheme);
    summaries[post.platform] = summary;
  }

  return summaries;
}

export function analyzeThemes(posts: readonly DailyPost[]): ThemeAnalysis {
  const analysis: ThemeAnalysis = {
    themeFrequency: {},
    themeGoals: {},
    themePlatforms: {},
    themeConsistency: {},
  };

  for (const post of posts) {
    const theme = post.contentTheme;
    increment(analysis.themeFrequency, theme);
    analysis.themeGoals[theme] = [...(analysis.themeGoals[theme] ?? []), post.goal];
    analysis.themePlatforms[theme] = [...(analysis.themePlatforms[theme] ?? []), post.platform];
  }

  for (const [theme, goals] of Object.entries(analysis.themeGoals)) {
    const goalDiversity = new Set(goals).size;
    analysis.themeConsistency[theme] = {
      goalDiversity,
      consistencyScore: goalDiversity <= 2 ? 1 : 0.5,
    };
  }

  return analysis;
}

export function buildImplementationGuide(platforms: readonly Platform[]): ImplementationGuide {
  const optimalTimes: Partial<Record<Platform, string>> = {};
  for (const platform of platforms) {
    optimalTimes[platform] = OPTIMAL_POSTING_TIMES[platform];
  }

  return {
    preLaunchChecklist: [
      'Review all content for brand voice alignment',
      'Prepare visual assets for each post',
      'Set up scheduling tools for each platform',
      'Prepare hashtag lists for easy copy-paste',
      'Create content approval workflow',
    ],
    postingSchedule: {
      frequency: 'Daily posting across selected platforms',
      optimalTimes,
      contentPreparation: 'Prepare content 2-3 days in advance',
      engagementMonitoring: 'Monitor comments and engagement for 2 hours after posting',
    },
    qualityAssurance: [
      'Ensure all content aligns with brand voice and tone',
      'Verify hashtags are relevant and not overused',
      'Check visual quality and brand consistency',
      'Test links and call-to-actions',
      'Review for grammar and spelling',
    ],
    performanceTracking: [
      'Track engagement rates for each post',
      'Monitor reach and impressions',
      'Analyze which content types perform best',
      'Track hashtag performance',
      'Measure goal achievement (awareness, leads, etc.)',
    ],
  };
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export function buildCalendarTable(posts: readonly DailyPost[]): CalendarTableRow[] {
  return posts.map((post) => ({
    day: post.dayName,
    platform: post.platform,
    type: post.postType,
    title: truncate(post.title, TITLE_LIMIT),
    goal: truncate(post.goal, GOAL_LIMIT),
    theme: post.contentTheme,
  }));
}

/**
 * Collect days 1-7 from the store, filling gaps with placeholder posts
 */
export function collectWeek(
  store: ContextStore,
  brand: BrandProfile,
  options: { weekStart?: Date; now: Date }
): { posts: DailyPost[]; placeholderDays: DayNumber[]; weekStart: Date } {
  const existing = DAY_NUMBERS.map((day) => store.get(postKey(day)));
  const pinned = existing.find((post) => post !== undefined);
  const weekStart =
    (pinned && parseWeekStart(pinned.scheduledDate)) ??
    options.weekStart ??
    weekStartFor(options.now);

  const placeholderDays: DayNumber[] = [];
  const posts = DAY_NUMBERS.map((day, index) => {
    const post = existing[index];
    if (post) return post;
    placeholderDays.push(day);
    return createPlaceholderPost(day, brand, weekStart, options.now);
  });

  return { posts, placeholderDays, weekStart };
}

export function assembleCalendar(
  posts: DailyPost[],
  context: {
    business: BusinessProfile;
    brand: BrandProfile;
    selection: PlatformSelection;
    placeholderDays: DayNumber[];
    weekStart: Date;
    now: Date;
  }
): ContentCalendar {
  const { business, brand, selection } = context;

  return {
    overview: {
      totalPosts: posts.length,
      platformsCovered: [...selection.platforms],
      contentThemes: posts.map((post) => post.contentTheme),
      calendarPeriod: '1 week',
      weekStart: formatWeekStart(context.weekStart),
      generatedAt: context.now.toISOString(),
    },
    businessContext: {
      industry: business.industry,
      targetAudience: business.targetAudience,
      businessGoals: business.businessGoals,
      brandVoice: brand.voice,
      brandTone: brand.tone,
    },
    dailyPosts: posts,
    statistics: calculateStatistics(posts),
    platformSummaries: summarizePlatforms(posts),
    themeAnalysis: analyzeThemes(posts),
    implementationGuide: buildImplementationGuide(selection.platforms),
    table: buildCalendarTable(posts),
    placeholderDays: context.placeholderDays,
  };
}

/**
 * Stage: requires intake and strategy, writes `calendar`.
 * Missing daily posts become placeholders rather than errors.
 */
export function buildCalendar(
  store: ContextStore,
  options: CalendarOptions = {}
): StageResult<ContentCalendar> {
  const clock = options.clock ?? (() => new Date());

  return runStage(store, {
    name: 'calendar',
    requires: ['business', 'brand', 'platforms', 'strategy'],
    compute: (source) => {
      const brand = source.require('brand');
      const now = clock();
      const { posts, placeholderDays, weekStart } = collectWeek(source, brand, {
        weekStart: options.weekStart,
        now,
      });

      return assembleCalendar(posts, {
        business: source.require('business'),
        brand,
        selection: source.require('platforms'),
        placeholderDays,
        weekStart,
        now,
      });
    },
    commit: (target, calendar) => target.set('calendar', calendar),
    describe: (calendar) =>
      calendar.placeholderDays.length > 0
        ? `Content calendar built with ${calendar.placeholderDays.length} placeholder post(s)`
        : 'Content calendar built successfully',
  });
}
