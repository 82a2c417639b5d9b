export { collectBusinessProfile, collectBrandProfile, selectPlatforms, parseInput } from './collect';
export {
  PLATFORMS,
  PlatformSchema,
  BusinessProfileSchema,
  BrandProfileSchema,
  PlatformSelectionSchema,
  DEFAULT_PLATFORM_PRIORITIES,
  requiredText,
} from './types';

export type {
  Platform,
  BusinessProfile,
  BrandProfile,
  PlatformSelection,
  BusinessProfileInput,
  BrandProfileInput,
  PlatformSelectionInput,
  PlatformSelectionResult,
} from './types';
