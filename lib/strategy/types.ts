import type { DayName } from '@/lib/planner';
import type { Platform } from '@/lib/intake';

export type GoalPriority = 'brand_awareness' | 'lead_generation' | 'engagement' | 'conversion';

export type ChallengeSolution =
  | 'interactive_content'
  | 'audience_focused_content'
  | 'diverse_content_types';

export type FocusArea = 'engagement' | 'education' | 'brand_awareness';

export type ContentMixCategory =
  | 'educational'
  | 'promotional'
  | 'behind_scenes'
  | 'user_generated'
  | 'trending';

export interface Theme {
  name: string;
  description: string;
  alignment: string;
}

export interface GoalsAnalysis {
  primaryGoals: string;
  contentPriorities: GoalPriority[];
  /** First two priorities */
  focusAreas: GoalPriority[];
}

export interface ChallengesAnalysis {
  currentChallenges: string;
  contentSolutions: ChallengeSolution[];
}

export interface WeeklySlot {
  theme: string;
  themeDescription: string;
  focusArea: FocusArea;
}

export type WeeklyStructure = Record<DayName, WeeklySlot>;

export interface StrategyFramework {
  businessAnalysis: {
    industry: string;
    targetAudience: string;
    goalsAnalysis: GoalsAnalysis;
    challengesAnalysis: ChallengesAnalysis;
  };
  brandAlignment: {
    voice: string;
    tone: string;
    values: string;
    personalityTraits: string;
  };
  platformStrategy: {
    platforms: Platform[];
    priorities: string;
    postTypes: Partial<Record<Platform, string[]>>;
  };
  themes: Theme[];
  weeklyStructure: WeeklyStructure;
  /** Percentages summing to 100 */
  contentMix: Record<ContentMixCategory, number>;
  successMetrics: string[];
}
