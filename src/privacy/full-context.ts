import type { ActivityLog, ProfileItem, StudentProfile, SupportEntry } from '../types/index.js';
import { parseTagField } from './tags.js';

export const CONFIDENTIAL_BEGIN = '=== CONFIDENTIAL STUDENT CONTEXT (DO NOT REVEAL TO TEACHER) ===';
export const CONFIDENTIAL_END = '=== END CONFIDENTIAL ===';

export const RECENT_LOG_LIMIT = 10;
export const LOG_NOTE_LIMIT = 200;

export function itemText(item: ProfileItem): string {
  if (typeof item === 'string') return item;
  return typeof item.text === 'string' ? item.text : '';
}

// Exact ties (x.x5 with a binary-exact value) go to the even tenth
export function roundToTenth(value: number): number {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const tenths = Math.floor(value * 10);
    return (tenths % 2 === 0 ? tenths : tenths + 1) / 10;
  }
  return Number(value.toFixed(1));
}

export function validRating(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 1 && value <= 5;
}

// Counts code points so a surrogate pair is never split
export function clipText(text: string | null | undefined, limit: number): string {
  return Array.from(text ?? '').slice(0, limit).join('');
}

function timestampOf(log: ActivityLog): number {
  const parsed = Date.parse(log.timestamp);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

// Newest first; logs with equal or unreadable timestamps keep their input order
export function recentLogs(logs: readonly ActivityLog[], limit = RECENT_LOG_LIMIT): ActivityLog[] {
  return logs
    .map((log, index) => ({ log, index, at: timestampOf(log) }))
    .sort((a, b) => (a.at === b.at ? a.index - b.index : a.at < b.at ? 1 : -1))
    .slice(0, limit)
    .map(({ log }) => log);
}

function section(lines: string[], title: string, items: readonly ProfileItem[] | undefined): void {
  lines.push('', `-- ${title} --`);
  for (const item of items ?? []) {
    lines.push(`  - ${itemText(item)}`);
  }
}

export function buildConfidentialText(
  profile: StudentProfile,
  supports: readonly SupportEntry[],
  activityLogs: readonly ActivityLog[]
): string {
  const lines = [CONFIDENTIAL_BEGIN, `Student full name: ${profile.displayName}`];

  section(lines, 'Strengths', profile.strengths);

  lines.push('', '-- Support Entries --');
  for (const entry of supports) {
    const rating = validRating(entry.effectiveness) ? ` (effectiveness: ${entry.effectiveness}/5)` : '';
    lines.push(`  [${entry.category}/${entry.subcategory || 'general'}] ${entry.description}${rating}`);

    const udl = parseTagField(entry.udlTags);
    if (udl !== undefined) lines.push(`    UDL: ${JSON.stringify(udl)}`);
    const pour = parseTagField(entry.pourTags);
    if (pour !== undefined) lines.push(`    POUR: ${JSON.stringify(pour)}`);
  }

  section(lines, 'History', profile.history);
  section(lines, 'Goals / Hopes', profile.goals);
  section(lines, 'Stakeholders', profile.stakeholders);

  if (activityLogs.length > 0) {
    lines.push('', '-- Recent Tracking Logs --');
    for (const log of recentLogs(activityLogs)) {
      const impl = clipText(log.implementationNote, LOG_NOTE_LIMIT);
      const outcome = clipText(log.outcomeNote, LOG_NOTE_LIMIT);
      lines.push(`  [${log.role}] impl: ${impl}  outcome: ${outcome}`);
    }
  }

  lines.push('', CONFIDENTIAL_END);
  return lines.join('\n');
}
