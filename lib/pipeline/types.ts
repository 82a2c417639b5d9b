import type { DayNumber } from '@/lib/planner';
import type { BrandProfile, BusinessProfile, PlatformSelection } from '@/lib/intake';
import type { StrategyFramework } from '@/lib/strategy';
import type { ContentCalendar, ContentTypeRecommendation, DailyPost } from '@/lib/content';
import type { HashtagRecommendation } from '@/lib/hashtags';
import type { StrategySummary } from '@/lib/summary';
import type { BrandVisualGuidelines, VisualConcept } from '@/lib/visuals';

interface RunArtifacts {
  business: BusinessProfile;
  brand: BrandProfile;
  platforms: PlatformSelection;
  strategy: StrategyFramework;
  calendar: ContentCalendar;
  visuals: BrandVisualGuidelines;
  summary: StrategySummary;
}

type DayScoped<P extends string, V> = { [D in DayNumber as `${P}:${D}`]: V };

/**
 * Closed key set of one planning run and the artifact stored under each key
 */
export type ArtifactMap = RunArtifacts &
  DayScoped<'contentTypes', ContentTypeRecommendation[]> &
  DayScoped<'post', DailyPost> &
  DayScoped<'hashtags', HashtagRecommendation> &
  DayScoped<'visual', VisualConcept>;

export type ArtifactKey = keyof ArtifactMap;

export function contentTypesKey(day: DayNumber) {
  return `contentTypes:${day}` as const;
}

export function postKey(day: DayNumber) {
  return `post:${day}` as const;
}

export function hashtagsKey(day: DayNumber) {
  return `hashtags:${day}` as const;
}

export function visualKey(day: DayNumber) {
  return `visual:${day}` as const;
}
