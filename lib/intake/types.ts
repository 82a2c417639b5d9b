import { z } from 'zod';

export const PLATFORMS = ['Facebook', 'Instagram', 'LinkedIn'] as const;

export const PlatformSchema = z.enum(PLATFORMS);

export type Platform = z.infer<typeof PlatformSchema>;

export function requiredText(field: string) {
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be text` })
    .trim()
    .min(1, `${field} must not be empty`);
}

export const BusinessProfileSchema = z.object({
  industry: requiredText('industry'),
  targetAudience: requiredText('targetAudience'),
  businessGoals: requiredText('businessGoals'),
  currentChallenges: requiredText('currentChallenges'),
});

export const BrandProfileSchema = z.object({
  voice: requiredText('voice'),
  tone: requiredText('tone'),
  coreValues: requiredText('coreValues'),
  personalityAdjectives: requiredText('personalityAdjectives'),
});

export const DEFAULT_PLATFORM_PRIORITIES = 'Equal focus on all selected platforms';

export const PlatformSelectionSchema = z.object({
  platforms: z
    .array(PlatformSchema, { required_error: 'platforms is required' })
    .min(1, 'At least one platform must be selected')
    .refine((platforms) => new Set(platforms).size === platforms.length, {
      message: 'Platforms must not repeat',
    }),
  priorities: requiredText('priorities').default(DEFAULT_PLATFORM_PRIORITIES),
});

export type BusinessProfile = Readonly<z.infer<typeof BusinessProfileSchema>>;
export type BrandProfile = Readonly<z.infer<typeof BrandProfileSchema>>;

export interface PlatformSelection {
  readonly platforms: readonly Platform[];
  readonly priorities: string;
}

export type BusinessProfileInput = z.input<typeof BusinessProfileSchema>;
export type BrandProfileInput = z.input<typeof BrandProfileSchema>;
export type PlatformSelectionInput = z.input<typeof PlatformSelectionSchema>;

export interface PlatformSelectionResult {
  selection: PlatformSelection;
  guidance: Partial<Record<Platform, string>>;
}
