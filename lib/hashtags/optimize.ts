import { containsAny, lookupBySubstring, countMatches } from '@/lib/rules';
import type { Platform } from '@/lib/intake';
import type { DailyPost } from '@/lib/content';
import type { HashtagRecommendation, OptimizedHashtagSet } from './types';
import { cleanTag, dedupeTags } from './keywords';
import {
  GENERAL_BUSINESS_TAGS,
  INDUSTRY_DEFAULT_TAGS,
  PLATFORM_GUIDELINES,
  windowFor,
} from './guidelines';
import { checkCompliance } from './compliance';

export interface OptimizeInput {
  hashtags: readonly string[];
  platform: Platform;
  contentType: string;
  industry: string;
}

export function isAvoided(tag: string, platform: Platform): boolean {
  return containsAny(cleanTag(tag), PLATFORM_GUIDELINES[platform].avoid);
}

/**
 * Stable ranking by how many of the platform's criteria each tag mentions
 */
export function rankForPlatform(hashtags: readonly string[], platform: Platform): string[] {
  const criteria = PLATFORM_GUIDELINES[platform].rankingCriteria;
  return hashtags
    .map((tag) => ({ tag, score: countMatches(cleanTag(tag), criteria) }))
    .sort((a, b) => b.score - a.score)
    .map(({ tag }) => tag);
}

/**
 * Tags to top a set up to `needed`: industry defaults first, then general business tags.
 * Skips tags already present or on the avoid list; may return fewer than needed.
 */
export function backfillTags(
  present: readonly string[],
  needed: number,
  platform: Platform,
  industry: string
): string[] {
  if (needed <= 0) return [];

  const taken = new Set(present.map((tag) => tag.toLowerCase()));
  const sources = [
    ...(lookupBySubstring(industry, INDUSTRY_DEFAULT_TAGS) ?? []),
    ...GENERAL_BUSINESS_TAGS,
  ];

  return sources
    .filter((tag) => !taken.has(tag.toLowerCase()) && !isAvoided(tag, platform))
    .slice(0, needed);
}

/**
 * Filter, backfill, rank and size a hashtag set for one platform and content type
 */
export function optimizeHashtags(input: OptimizeInput): OptimizedHashtagSet {
  const { platform, contentType, industry } = input;
  const platformWindow = PLATFORM_GUIDELINES[platform].window;
  const window = windowFor(platform, contentType);

  const unique = dedupeTags(input.hashtags, (tag) => tag);
  const removed = unique.filter((tag) => isAvoided(tag, platform));
  const kept = unique.filter((tag) => !isAvoided(tag, platform));

  const toPlatformMin = backfillTags(kept, platformWindow.min - kept.length, platform, industry);
  const ranked = rankForPlatform([...kept, ...toPlatformMin], platform).slice(0, window.max);
  const toWindowMin = backfillTags(ranked, window.min - ranked.length, platform, industry);
  const hashtags = [...ranked, ...toWindowMin];

  const backfilledKeys = new Set(
    [...toPlatformMin, ...toWindowMin].map((tag) => tag.toLowerCase())
  );

  return {
    platform,
    contentType,
    hashtags,
    removed,
    backfilled: hashtags.filter((tag) => backfilledKeys.has(tag.toLowerCase())),
    window,
    underfilled: hashtags.length < window.min,
    compliance: checkCompliance(hashtags, platform, industry),
  };
}

/**
 * Feed a researched set through the optimizer for the post's content type
 */
export function optimizeHashtagsForPost(
  research: Pick<HashtagRecommendation, 'platform' | 'finalSet'>,
  post: Pick<DailyPost, 'postType'>,
  industry: string
): OptimizedHashtagSet {
  return optimizeHashtags({
    hashtags: research.finalSet,
    platform: research.platform,
    contentType: post.postType,
    industry,
  });
}
