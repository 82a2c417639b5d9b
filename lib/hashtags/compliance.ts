import { containsAny } from '@/lib/rules';
import type { Platform } from '@/lib/intake';
import type { ComplianceCheck, ComplianceReport } from './types';
import { cleanTag } from './keywords';
import {
  BEST_PRACTICE_THRESHOLD,
  CASUAL_KEYWORDS,
  PLATFORM_GUIDELINES,
  PROFESSIONAL_KEYWORDS,
  RELEVANCE_THRESHOLD,
} from './guidelines';

const COMPLIANT = 'No action needed';

function check(passed: boolean, remediation: string): ComplianceCheck {
  return { passed, remediation: passed ? COMPLIANT : remediation };
}

function industryWords(industry: string): string[] {
  return industry.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
}

/**
 * At least half the tags mention a word of the industry name
 */
export function isRelevant(hashtags: readonly string[], industry: string): boolean {
  const words = industryWords(industry);
  const relevant = hashtags.filter((tag) => containsAny(cleanTag(tag), words)).length;
  return relevant >= hashtags.length * RELEVANCE_THRESHOLD;
}

export function isProfessional(hashtags: readonly string[]): boolean {
  const professional = hashtags.filter((tag) => containsAny(tag, PROFESSIONAL_KEYWORDS)).length;
  const casual = hashtags.filter((tag) => containsAny(tag, CASUAL_KEYWORDS)).length;
  return professional >= casual;
}

/**
 * Practices that name something checkable are evaluated; the rest pass
 */
export function followsPractice(
  practice: string,
  hashtags: readonly string[],
  industry: string
): boolean {
  const text = practice.toLowerCase();
  if (text.includes('relevant')) return isRelevant(hashtags, industry);
  if (text.includes('sparingly')) return hashtags.length <= 3;
  if (text.includes('professional')) return isProfessional(hashtags);
  if (text.includes('community')) {
    return hashtags.some((tag) => containsAny(tag, ['community', 'local']));
  }
  return true;
}

export function checkCompliance(
  hashtags: readonly string[],
  platform: Platform,
  industry: string
): ComplianceReport {
  const guidelines = PLATFORM_GUIDELINES[platform];
  const { min, max } = guidelines.window;
  const cleaned = hashtags.map(cleanTag);

  const followed = guidelines.bestPractices.filter((practice) =>
    followsPractice(practice, hashtags, industry)
  ).length;

  const report = {
    countCompliance: check(
      hashtags.length >= min && hashtags.length <= max,
      `Use between ${min} and ${max} hashtags on ${platform}`
    ),
    appropriatenessCompliance: check(
      cleaned.length > 0 && cleaned.every((tag) => containsAny(tag, guidelines.appropriate)),
      `Replace hashtags that are not ${platform}-suitable (${guidelines.appropriate.join(', ')})`
    ),
    avoidListCompliance: check(
      !cleaned.some((tag) => containsAny(tag, guidelines.avoid)),
      "Remove hashtags that appear on the platform's avoid list"
    ),
    bestPracticeAdherence: check(
      followed >= guidelines.bestPractices.length * BEST_PRACTICE_THRESHOLD,
      'Review and align with platform best practices'
    ),
  };

  return {
    ...report,
    overall: Object.values(report).every((item) => item.passed),
  };
}
