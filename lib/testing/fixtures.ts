import { ContextStore } from '@/lib/pipeline';
import {
  collectBrandProfile,
  collectBusinessProfile,
  selectPlatforms,
  type BrandProfileInput,
  type BusinessProfileInput,
  type PlatformSelectionInput,
} from '@/lib/intake';
import { buildStrategy } from '@/lib/strategy';

// ============================================
// Sample Data
// ============================================

export const TECH_BUSINESS: BusinessProfileInput = {
  industry: 'Technology',
  targetAudience: 'Small business owners aged 25-45',
  businessGoals: 'Increase brand awareness and generate leads',
  currentChallenges: 'Low engagement rates and difficulty reaching target audience',
};

export const PROFESSIONAL_BRAND: BrandProfileInput = {
  voice: 'Professional and authoritative',
  tone: 'Encouraging and supportive',
  coreValues: 'Innovation, quality, customer-first',
  personalityAdjectives: 'trustworthy, innovative, reliable',
};

export const CASUAL_BRAND: BrandProfileInput = {
  voice: 'Casual and friendly',
  tone: 'Warm and approachable',
  coreValues: 'Transparency, sustainability, community',
  personalityAdjectives: 'creative, bold, authentic',
};

export const INSTAGRAM_LINKEDIN: PlatformSelectionInput = {
  platforms: ['Instagram', 'LinkedIn'],
  priorities: 'Primary focus on Instagram, secondary on LinkedIn',
};

export const FIXED_NOW = new Date('2024-01-08T09:00:00.000Z');

export const fixedClock = () => FIXED_NOW;

/**
 * Store with the three intake artifacts written
 */
export function createIntakeStore(
  business: BusinessProfileInput = TECH_BUSINESS,
  brand: BrandProfileInput = PROFESSIONAL_BRAND,
  platforms: PlatformSelectionInput = INSTAGRAM_LINKEDIN
): ContextStore {
  const store = new ContextStore();
  const results = [
    collectBusinessProfile(store, business),
    collectBrandProfile(store, brand),
    selectPlatforms(store, platforms),
  ];

  for (const result of results) {
    if (result.status === 'error') {
      throw new Error(`Fixture intake failed: ${result.message}`);
    }
  }

  return store;
}

/**
 * Store with intake artifacts and the strategy framework written
 */
export function createStrategyStore(
  business: BusinessProfileInput = TECH_BUSINESS,
  brand: BrandProfileInput = PROFESSIONAL_BRAND,
  platforms: PlatformSelectionInput = INSTAGRAM_LINKEDIN
): ContextStore {
  const store = createIntakeStore(business, brand, platforms);
  const result = buildStrategy(store);

  if (result.status === 'error') {
    throw new Error(`Fixture strategy failed: ${result.message}`);
  }

  return store;
}
