#!/usr/bin/env tsx
/**
 * Plan one week for the sample business and print the artifacts as JSON
 * Run with: npm run plan-week [-- --csv]
 */

import 'dotenv/config';
import { runPlanningPipeline } from '../lib/orchestrator';
import { exportCalendarToCSV } from '../lib/export';
import { createLogger } from '../lib/log';

const logger = createLogger('plan-week');

const result = runPlanningPipeline(
  {
    business: {
      industry: 'Technology',
      targetAudience: 'Small business owners aged 25-45',
      businessGoals: 'Increase brand awareness and generate leads',
      currentChallenges: 'Low engagement rates and difficulty reaching target audience',
    },
    brand: {
      voice: 'Professional and authoritative',
      tone: 'Encouraging and supportive',
      coreValues: 'Innovation, quality, customer-first',
      personalityAdjectives: 'trustworthy, innovative, reliable',
    },
    platforms: {
      platforms: ['Instagram', 'LinkedIn'],
      priorities: 'Primary focus on Instagram, secondary on LinkedIn',
    },
  },
  { brandedTags: ['WeeklyPlanner'], brandColors: '#1E40AF #F59E0B #10B981', logger }
);

if (result.status === 'error') {
  logger.error(result.message, { details: result.error.details });
  process.exitCode = 1;
} else if (process.argv.includes('--csv')) {
  console.log(exportCalendarToCSV(result.data.calendar, result.data.hashtags));
} else {
  const { platformGuidance, strategy, calendar, hashtags, visuals, visualConcepts, summary } =
    result.data;
  console.log(
    JSON.stringify(
      { platformGuidance, strategy, calendar, hashtags, visuals, visualConcepts, summary },
      null,
      2
    )
  );
}
