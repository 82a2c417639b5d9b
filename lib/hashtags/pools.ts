import { z } from 'zod';
import rawPools from './data/hashtag-pools.json';

const TagSchema = z.string().regex(/^#\S+$/, 'Hashtags start with # and contain no spaces');

const TagListSchema = z.array(TagSchema);

const TieredTagsSchema = z.object({
  primary: TagListSchema,
  secondary: TagListSchema,
  niche: TagListSchema,
});

const PlatformTagsSchema = z.object({
  Facebook: TagListSchema,
  Instagram: TagListSchema,
  LinkedIn: TagListSchema,
});

export const HashtagPoolsSchema = z.object({
  stopWords: z.array(z.string().min(1)),
  generalTrending: TagListSchema.min(1),
  industryTrending: z.array(z.tuple([z.string().min(1), TagListSchema])),
  defaultIndustryTrending: TagListSchema,
  platformTrending: PlatformTagsSchema,
  platformRecommended: PlatformTagsSchema,
  industry: z.array(z.tuple([z.string().min(1), TieredTagsSchema])),
  defaultIndustry: TieredTagsSchema,
  audience: z.object({
    professional: TieredTagsSchema,
    entrepreneur: TieredTagsSchema,
    student: TieredTagsSchema,
    general: TieredTagsSchema,
  }),
});

export type HashtagPools = z.infer<typeof HashtagPoolsSchema>;
export type TieredTags = z.infer<typeof TieredTagsSchema>;
export type HashtagAudienceType = keyof HashtagPools['audience'];

/**
 * Validate candidate tables; throws a ZodError when the data file is malformed
 */
export function loadHashtagPools(source: unknown = rawPools): HashtagPools {
  return HashtagPoolsSchema.parse(source);
}

export const HASHTAG_POOLS = loadHashtagPools();
