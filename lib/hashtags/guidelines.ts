import type { Platform } from '@/lib/intake';
import type { HashtagWindow } from './types';

export interface PlatformGuidelines {
  window: HashtagWindow;
  /** Tags containing any of these are filtered out */
  avoid: readonly string[];
  /** Every tag in a compliant set contains one of these */
  appropriate: readonly string[];
  rankingCriteria: readonly string[];
  bestPractices: readonly string[];
  /** "N-M" counts per content type */
  contentTypeWindows: Readonly<Partial<Record<string, string>>>;
  placement: string;
}

export const PLATFORM_GUIDELINES: Record<Platform, PlatformGuidelines> = {
  Facebook: {
    window: { min: 1, max: 3 },
    avoid: ['casual', 'personal', 'viral', 'spam'],
    appropriate: ['business', 'community', 'local', 'professional', 'industry'],
    rankingCriteria: ['community', 'local', 'discussion', 'engagement'],
    bestPractices: [
      'Use sparingly to avoid appearing spammy',
      'Focus on community and local hashtags',
      'Place hashtags at the end of posts',
      'Use hashtags that encourage discussion',
    ],
    contentTypeWindows: {
      'Image Post': '1-2',
      Video: '2-3',
      'Link Share': '1-2',
    },
    placement: 'Place hashtags at the end of the post or in the first comment',
  },
  Instagram: {
    window: { min: 5, max: 15 },
    avoid: ['spam', 'fake', 'irrelevant', 'follow4follow', 'like4like'],
    appropriate: ['business', 'entrepreneur', 'marketing', 'industry', 'lifestyle', 'creative'],
    rankingCriteria: ['visual', 'trending', 'lifestyle', 'creative'],
    bestPractices: [
      'Mix popular and niche hashtags',
      'Include branded hashtags',
      'Use hashtags in first comment or caption',
      'Research hashtag performance before using',
    ],
    contentTypeWindows: {
      'Feed Post': '10-15',
      Story: '1-3',
      Reel: '8-12',
      IGTV: '5-10',
    },
    placement: 'Place hashtags at the end of the caption or in the first comment',
  },
  LinkedIn: {
    window: { min: 3, max: 5 },
    avoid: ['casual', 'personal', 'fun', 'entertainment', 'lifestyle'],
    appropriate: ['business', 'professional', 'career', 'industry', 'leadership', 'networking'],
    rankingCriteria: ['professional', 'career', 'industry', 'networking'],
    bestPractices: [
      'Focus on professional and industry hashtags',
      'Use hashtags that relate to your expertise',
      'Include location-based hashtags if relevant',
      'Place hashtags at the end of posts',
    ],
    contentTypeWindows: {
      Article: '3-5',
      'Image Post': '3-4',
      Video: '4-5',
      'Text Post': '3-5',
    },
    placement: 'Place hashtags at the end of the post content',
  },
};

// Backfill sources, tried in order
export const INDUSTRY_DEFAULT_TAGS: readonly (readonly [string, readonly string[]])[] = [
  ['technology', ['#tech', '#innovation', '#digital']],
  ['healthcare', ['#health', '#wellness', '#medical']],
  ['finance', ['#finance', '#investment', '#money']],
  ['education', ['#education', '#learning', '#knowledge']],
  ['e-commerce', ['#ecommerce', '#retail', '#online']],
];

export const GENERAL_BUSINESS_TAGS: readonly string[] = [
  '#business',
  '#professional',
  '#growth',
  '#success',
  '#marketing',
];

export const PROFESSIONAL_KEYWORDS: readonly string[] = [
  'business',
  'professional',
  'career',
  'industry',
  'leadership',
];

export const CASUAL_KEYWORDS: readonly string[] = ['fun', 'party', 'casual', 'personal', 'lifestyle'];

export const BEST_PRACTICE_THRESHOLD = 0.7;

export const RELEVANCE_THRESHOLD = 0.5;

const RANGE_PATTERN = /(\d+)-(\d+)/;

/**
 * Parse an "N-M" count range
 */
export function parseCountRange(text: string): HashtagWindow | null {
  const match = RANGE_PATTERN.exec(text);
  if (!match) return null;
  return { min: Number(match[1]), max: Number(match[2]) };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Platform window narrowed by the content type's range, never leaving the platform window
 */
export function windowFor(platform: Platform, contentType?: string): HashtagWindow {
  const guidelines = PLATFORM_GUIDELINES[platform];
  const range = contentType ? guidelines.contentTypeWindows[contentType] : undefined;
  const parsed = range ? parseCountRange(range) : null;
  if (!parsed) {
    return { ...guidelines.window };
  }

  const min = clamp(parsed.min, guidelines.window.min, guidelines.window.max);
  const max = clamp(parsed.max, min, guidelines.window.max);
  return { min, max };
}
