import { generalizeGoal, generalizeStrength } from '../themes/index.js';
import type {
  ActivityLog,
  AggregateResult,
  ProfileItem,
  SafeView,
  StudentProfile,
  StudentRecord,
  SupportEntry
} from '../types/index.js';
import { buildConfidentialText, itemText, roundToTenth, validRating } from './full-context.js';
import { foldTags, parseTagField } from './tags.js';

export const FIRST_NAME_PLACEHOLDER = 'Student';

export function firstNameOnly(displayName: string): string {
  return displayName.trim().split(/\s+/)[0] || FIRST_NAME_PLACEHOLDER;
}

function themes(items: readonly ProfileItem[] | undefined, generalize: (text: string) => string): string[] {
  const found = new Set<string>();
  for (const item of items ?? []) {
    const theme = generalize(itemText(item));
    if (theme) found.add(theme);
  }
  return [...found].sort();
}

function buildSafeView(profile: StudentProfile, supports: readonly SupportEntry[]): SafeView {
  const counts = new Map<string, number>();
  const ratings = new Map<string, { total: number; count: number }>();
  const udl = new Set<string>();
  const pour = new Set<string>();
  let activeSupportCount = 0;

  for (const entry of supports) {
    counts.set(entry.category, (counts.get(entry.category) ?? 0) + 1);

    if (validRating(entry.effectiveness)) {
      const tally = ratings.get(entry.category) ?? { total: 0, count: 0 };
      tally.total += entry.effectiveness;
      tally.count += 1;
      ratings.set(entry.category, tally);
    }

    foldTags(parseTagField(entry.udlTags), false, udl);
    foldTags(parseTagField(entry.pourTags), true, pour);

    if (entry.status === 'active') activeSupportCount++;
  }

  const averages = [...ratings].map(
    ([category, { total, count }]) => [category, roundToTenth(total / count)] as const
  );

  return {
    firstNameOnly: firstNameOnly(profile.displayName),
    supportCategories: [...counts.keys()].sort(),
    categoryCounts: Object.fromEntries(counts),
    strengthThemes: themes(profile.strengths, generalizeStrength),
    goalThemes: themes(profile.goals, generalizeGoal),
    activeSupportCount,
    udlPrinciples: [...udl].sort(),
    pourPrinciples: [...pour].sort(),
    effectivenessByCategory: Object.fromEntries(averages)
  };
}

/**
 * Splits one student's data into a coarse safe view for lower-trust readers
 * and a confidential full view meant only as model context.
 *
 * Every safe-view field is a count, a controlled-vocabulary tag, a rounded
 * average or a generalized theme; the first name is the only identifying
 * value and is cut from the full name. Pure: identical input gives
 * identical output.
 */
export function aggregate(
  profile: StudentProfile,
  supports: readonly SupportEntry[],
  activityLogs: readonly ActivityLog[] = []
): AggregateResult {
  return {
    safeView: buildSafeView(profile, supports),
    fullView: { confidentialText: buildConfidentialText(profile, supports, activityLogs) }
  };
}

export function aggregateRecord(record: StudentRecord): AggregateResult {
  return aggregate(record.profile, record.supports, record.activityLogs);
}
