export {
  allocateQuotas,
  classifyAudience,
  gatherCandidateGroups,
  rankCandidates,
  recommendHashtags,
  researchHashtags,
  selectHashtags,
} from './recommend';
export {
  backfillTags,
  isAvoided,
  optimizeHashtags,
  optimizeHashtagsForPost,
  rankForPlatform,
} from './optimize';
export { checkCompliance, followsPractice, isProfessional, isRelevant } from './compliance';
export {
  GENERAL_BUSINESS_TAGS,
  INDUSTRY_DEFAULT_TAGS,
  PLATFORM_GUIDELINES,
  parseCountRange,
  windowFor,
} from './guidelines';
export { cleanTag, dedupeTags, extractContentKeywords, scoreHashtag, toHashtag } from './keywords';
export { HASHTAG_POOLS, HashtagPoolsSchema, loadHashtagPools } from './pools';

export type { HashtagResearchInput, HashtagResearch } from './recommend';
export type { OptimizeInput } from './optimize';
export type { PlatformGuidelines } from './guidelines';
export type { HashtagPools, TieredTags, HashtagAudienceType } from './pools';
export type {
  HashtagCategory,
  SelectionGroup,
  HashtagCandidate,
  HashtagWindow,
  ComplianceCheck,
  ComplianceReport,
  HashtagRecommendation,
  OptimizedHashtagSet,
  HashtagOptimization,
  HashtagRequest,
} from './types';
