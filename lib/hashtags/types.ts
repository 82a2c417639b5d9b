import type { DayNumber } from '@/lib/planner';
import type { Platform } from '@/lib/intake';

export type HashtagCategory = 'trending' | 'industry' | 'audience' | 'platform' | 'branded' | 'content';

export type SelectionGroup = 'popular' | 'niche' | 'branded' | 'content';

export interface HashtagCandidate {
  tag: string;
  category: HashtagCategory;
  /** Content keywords that match the tag */
  score: number;
}

export interface HashtagWindow {
  min: number;
  max: number;
}

export interface ComplianceCheck {
  passed: boolean;
  remediation: string;
}

export interface ComplianceReport {
  countCompliance: ComplianceCheck;
  appropriatenessCompliance: ComplianceCheck;
  avoidListCompliance: ComplianceCheck;
  bestPracticeAdherence: ComplianceCheck;
  overall: boolean;
}

export interface HashtagRecommendation {
  day: DayNumber;
  platform: Platform;
  contentKeywords: string[];
  /** Deduplicated, ranked by score, sized within the platform window */
  researchedSet: string[];
  /** The researched set after platform optimization; this is what gets published */
  finalSet: string[];
  breakdown: Record<SelectionGroup, string[]>;
  window: HashtagWindow;
  optimization: HashtagOptimization;
  /** Report on `finalSet` */
  compliance: ComplianceReport;
}

export interface OptimizedHashtagSet {
  platform: Platform;
  contentType: string;
  hashtags: string[];
  /** Tags dropped for matching the platform's avoid list */
  removed: string[];
  backfilled: string[];
  /** Platform window narrowed by the content type */
  window: HashtagWindow;
  underfilled: boolean;
  compliance: ComplianceReport;
}

export type HashtagOptimization = Pick<
  OptimizedHashtagSet,
  'contentType' | 'removed' | 'backfilled' | 'window' | 'underfilled'
>;

export interface HashtagRequest {
  day: number;
  brandedTags?: readonly string[];
}
