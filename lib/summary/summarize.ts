import { lookupBySubstring } from '@/lib/rules';
import {
  ValidationError,
  runStage,
  visualKey,
  type ContextStore,
  type StageResult,
} from '@/lib/pipeline';
import type { BrandProfile, BusinessProfile, Platform, PlatformSelection } from '@/lib/intake';
import type { StrategyFramework } from '@/lib/strategy';
import type { ContentCalendar, DailyPost } from '@/lib/content';
import { DAY_NUMBERS } from '@/lib/planner';
import type { BrandVisualGuidelines, VisualConcept } from '@/lib/visuals';
import type {
  CalendarSummary,
  ImplementationGuidance,
  PerformanceTracking,
  ScheduledPostSummary,
  StrategySummary,
  VisualDirection,
} from './types';

const WEEK_LENGTH = 7;

const BASE_SUCCESS_FACTORS = [
  'Consistent posting schedule',
  'High-quality visual content',
  'Engaging captions that reflect brand voice',
  'Strategic hashtag usage',
];

const INDUSTRY_SUCCESS_FACTORS: readonly (readonly [string, string])[] = [
  ['technology', 'Thought leadership content'],
  ['healthcare', 'Trust-building educational content'],
  ['e-commerce', 'Product showcase and social proof'],
];

const INDUSTRY_CREATION_TIPS: readonly (readonly [string, string])[] = [
  ['technology', 'Include relevant tech trends and innovations'],
  ['healthcare', 'Focus on patient education and wellness tips'],
  ['e-commerce', 'Showcase products in real-life scenarios'],
];

const ENGAGEMENT_STRATEGIES: Record<Platform, string[]> = {
  Facebook: [
    'Respond to comments within 2 hours',
    'Ask questions in posts to encourage discussion',
    'Share user-generated content',
    'Use Facebook Groups for community building',
  ],
  Instagram: [
    'Use Instagram Stories for behind-the-scenes content',
    'Engage with stories and posts from target audience',
    'Use relevant hashtags and location tags',
    'Post user-generated content and testimonials',
  ],
  LinkedIn: [
    'Share industry insights and thought leadership',
    "Comment thoughtfully on others' posts",
    'Use LinkedIn Polls for engagement',
    'Share company updates and achievements',
  ],
};

const NEXT_STEPS = {
  immediateActions: [
    'Review and approve content plan',
    'Prepare visual assets according to design suggestions',
    'Schedule posts using recommended timing',
    'Set up performance tracking tools',
  ],
  ongoingActivities: [
    'Monitor engagement and adjust content based on performance',
    'Engage with audience comments and messages',
    'Analyze weekly performance reports',
    'Iterate and optimize content strategy',
  ],
};

export function identifySuccessFactors(industry: string): string[] {
  const addition = lookupBySubstring(industry, INDUSTRY_SUCCESS_FACTORS);
  return addition ? [...BASE_SUCCESS_FACTORS, addition] : [...BASE_SUCCESS_FACTORS];
}

export function contentCreationTips(brand: BrandProfile, industry: string): string[] {
  const tips = [
    `Maintain ${brand.voice} voice consistently`,
    `Incorporate ${brand.coreValues} values in messaging`,
    'Use high-quality visuals that align with brand aesthetic',
    'Write captions that encourage engagement and conversation',
  ];
  const addition = lookupBySubstring(industry, INDUSTRY_CREATION_TIPS);
  return addition ? [...tips, addition] : tips;
}

export function engagementStrategies(
  platforms: readonly Platform[]
): Partial<Record<Platform, string[]>> {
  const strategies: Partial<Record<Platform, string[]>> = {};
  for (const platform of platforms) {
    strategies[platform] = [...ENGAGEMENT_STRATEGIES[platform]];
  }
  return strategies;
}

export function performanceTracking(successMetrics: readonly string[]): PerformanceTracking {
  return {
    keyMetrics: [...successMetrics],
    trackingFrequency: 'Weekly analysis, monthly comprehensive review',
    toolsRecommended: [
      'Platform native analytics',
      'Social media management tools',
      'Google Analytics for website traffic',
      'Custom tracking for lead generation',
    ],
    successBenchmarks: {
      engagementRate: 'Above industry average (3-6%)',
      reach: 'Steady month-over-month growth',
      leadGeneration: 'Track conversion from social to leads',
      brandAwareness: 'Monitor brand mentions and sentiment',
    },
  };
}

function scheduleEntry(post: DailyPost): ScheduledPostSummary {
  return { platform: post.platform, title: post.title, type: post.postType, goal: post.goal };
}

export function summarizeCalendar(calendar: ContentCalendar): CalendarSummary {
  const postingSchedule: CalendarSummary['postingSchedule'] = {};
  for (const post of calendar.dailyPosts) {
    postingSchedule[post.dayName] = scheduleEntry(post);
  }

  return {
    totalPosts: calendar.dailyPosts.length,
    platformDistribution: { ...calendar.statistics.platformDistribution },
    contentTypeDistribution: { ...calendar.statistics.contentTypeDistribution },
    postingSchedule,
  };
}

export function summarizeVisuals(
  visuals: BrandVisualGuidelines,
  concepts: readonly VisualConcept[]
): VisualDirection {
  const conceptsByDay: VisualDirection['conceptsByDay'] = {};
  for (const concept of concepts) {
    conceptsByDay[concept.dayName] = {
      approach: concept.approach,
      dimensions: concept.spec.dimensions,
      layout: concept.layout,
    };
  }

  return {
    styleDirection: visuals.styleDirection,
    palette: { ...visuals.color.palette },
    typography: visuals.typography.personality,
    conceptsByDay,
  };
}

export interface SummaryInput {
  business: BusinessProfile;
  brand: BrandProfile;
  platforms: PlatformSelection;
  strategy: StrategyFramework;
  calendar: ContentCalendar;
  visuals?: BrandVisualGuidelines;
  visualConcepts?: readonly VisualConcept[];
}

/**
 * Read-only rollup of the finished week
 */
export function assembleSummary(input: SummaryInput): StrategySummary {
  const { business, brand, platforms, strategy, calendar } = input;

  if (calendar.dailyPosts.length !== WEEK_LENGTH) {
    throw new ValidationError(
      `Expected ${WEEK_LENGTH} daily posts, found ${calendar.dailyPosts.length}`
    );
  }

  const implementationGuidance: ImplementationGuidance = {
    keySuccessFactors: identifySuccessFactors(strategy.businessAnalysis.industry),
    contentCreationTips: contentCreationTips(brand, business.industry),
    engagementStrategies: engagementStrategies(platforms.platforms),
    performanceTracking: performanceTracking(strategy.successMetrics),
  };

  const summary: StrategySummary = {
    executiveSummary: {
      businessOverview: {
        industry: business.industry,
        targetAudience: business.targetAudience,
        primaryGoals: business.businessGoals,
        keyChallenges: business.currentChallenges,
      },
      brandIdentity: {
        voice: brand.voice,
        tone: brand.tone,
        coreValues: brand.coreValues,
      },
      platformStrategy: {
        selectedPlatforms: [...platforms.platforms],
        platformPriorities: platforms.priorities,
      },
    },
    contentStrategyOverview: {
      primaryThemes: strategy.themes.map((theme) => theme.name),
      contentMix: { ...strategy.contentMix },
      weeklyStructure: strategy.weeklyStructure,
    },
    calendarSummary: summarizeCalendar(calendar),
    implementationGuidance,
    nextSteps: {
      immediateActions: [...NEXT_STEPS.immediateActions],
      ongoingActivities: [...NEXT_STEPS.ongoingActivities],
    },
  };

  if (input.visuals) {
    summary.visualDirection = summarizeVisuals(input.visuals, input.visualConcepts ?? []);
  }
  return summary;
}

/**
 * Stage: requires every upstream artifact, writes `summary`
 *
 * Brand visuals and per-day concepts are optional; when stored they are folded
 * into `visualDirection`.
 */
export function generateSummary(store: ContextStore): StageResult<StrategySummary> {
  return runStage(store, {
    name: 'summary',
    requires: ['business', 'brand', 'platforms', 'strategy', 'calendar'],
    compute: (source) =>
      assembleSummary({
        business: source.require('business'),
        brand: source.require('brand'),
        platforms: source.require('platforms'),
        strategy: source.require('strategy'),
        calendar: source.require('calendar'),
        visuals: source.get('visuals'),
        visualConcepts: DAY_NUMBERS.flatMap((day) => {
          const concept = source.get(visualKey(day));
          return concept ? [concept] : [];
        }),
      }),
    commit: (target, summary) => target.set('summary', summary),
    describe: () => 'Strategy summary generated successfully',
  });
}
