import type { ContentCalendar, DailyPost } from '@/lib/content';
import type { HashtagRecommendation } from '@/lib/hashtags';

const CSV_COLUMNS = [
  'scheduled_date',
  'day',
  'platform',
  'post_type',
  'theme',
  'goal',
  'title',
  'caption',
  'hashtags',
] as const;

type ExportRow = Record<(typeof CSV_COLUMNS)[number], string | number>;

export interface ExportedPost {
  day: number;
  day_name: string;
  scheduled_date: string;
  platform: string;
  post_type: string;
  theme: string;
  goal: string;
  title: string;
  caption: string;
  target_audience: string;
  hashtags: string[];
}

export interface CalendarExport {
  week_start: string;
  exported_at: string;
  total_posts: number;
  placeholder_days: number[];
  posts: ExportedPost[];
}

function hashtagsFor(post: DailyPost, hashtags: readonly HashtagRecommendation[]): string[] {
  return hashtags.find((recommendation) => recommendation.day === post.day)?.finalSet ?? [];
}

function escapeCsv(value: string | number): string {
  return `"${String(value).replace(/"/g, '""')}"`;
}

/**
 * Export the calendar to CSV, one row per post
 */
export function exportCalendarToCSV(
  calendar: ContentCalendar,
  hashtags: readonly HashtagRecommendation[] = []
): string {
  const rows: ExportRow[] = calendar.dailyPosts.map((post) => ({
    scheduled_date: post.scheduledDate,
    day: post.dayName,
    platform: post.platform,
    post_type: post.postType,
    theme: post.contentTheme,
    goal: post.goal,
    title: post.title,
    caption: post.caption,
    hashtags: hashtagsFor(post, hashtags).join(' '),
  }));

  const csvRows = [
    CSV_COLUMNS.join(','),
    ...rows.map((row) => CSV_COLUMNS.map((column) => escapeCsv(row[column])).join(',')),
  ];

  return csvRows.join('\n');
}

/**
 * Export the calendar to a JSON-ready object
 */
export function exportCalendarToJSON(
  calendar: ContentCalendar,
  hashtags: readonly HashtagRecommendation[] = [],
  exportedAt: Date = new Date()
): CalendarExport {
  return {
    week_start: calendar.overview.weekStart,
    exported_at: exportedAt.toISOString(),
    total_posts: calendar.dailyPosts.length,
    placeholder_days: [...calendar.placeholderDays],
    posts: calendar.dailyPosts.map((post) => ({
      day: post.day,
      day_name: post.dayName,
      scheduled_date: post.scheduledDate,
      platform: post.platform,
      post_type: post.postType,
      theme: post.contentTheme,
      goal: post.goal,
      title: post.title,
      caption: post.caption,
      target_audience: post.targetAudience,
      hashtags: hashtagsFor(post, hashtags),
    })),
  };
}
