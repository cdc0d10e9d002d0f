import type { ActivityLog, StudentProfile, SupportEntry } from '../types/index.js';
import { firstNameOnly } from './aggregator.js';
import { clipText, recentLogs, roundToTenth, validRating } from './full-context.js';
import { parseTagField } from './tags.js';

export const SUMMARY_NOTE_LIMIT = 300;

function formatTimestamp(timestamp: string): string {
  const parsed = Date.parse(timestamp);
  if (Number.isNaN(parsed)) return 'unknown';
  const iso = new Date(parsed).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}

/**
 * Support data addressed to the student themself: active supports with
 * ratings, every tracking log newest first, and overall rating counts.
 * Carries the first name only and leaves out history and stakeholders.
 */
export function buildSupportSummary(
  profile: StudentProfile,
  supports: readonly SupportEntry[],
  activityLogs: readonly ActivityLog[] = []
): string {
  const active = supports.filter((entry) => entry.status === 'active');
  const lines = [`Student first name: ${firstNameOnly(profile.displayName)}`, '', `Active supports: ${active.length}`, ''];

  if (active.length > 0) {
    lines.push('-- Support Entries --');
    for (const entry of active) {
      const rating = validRating(entry.effectiveness)
        ? ` (effectiveness: ${entry.effectiveness}/5)`
        : ' (no rating yet)';
      lines.push(`  [${entry.category}/${entry.subcategory || 'general'}] ${entry.description}${rating}`);

      const udl = parseTagField(entry.udlTags);
      if (udl !== undefined) lines.push(`    UDL: ${JSON.stringify(udl)}`);
      const pour = parseTagField(entry.pourTags);
      if (pour !== undefined) lines.push(`    POUR: ${JSON.stringify(pour)}`);
    }
    lines.push('');
  }

  if (activityLogs.length > 0) {
    lines.push(`-- Tracking Logs (${activityLogs.length} entries) --`);
    for (const log of recentLogs(activityLogs, activityLogs.length)) {
      lines.push(`  ${formatTimestamp(log.timestamp)} [${log.role}]`);
      const impl = clipText(log.implementationNote, SUMMARY_NOTE_LIMIT);
      if (impl) lines.push(`    Implementation: ${impl}`);
      const outcome = clipText(log.outcomeNote, SUMMARY_NOTE_LIMIT);
      if (outcome) lines.push(`    Outcome: ${outcome}`);
    }
    lines.push('');
  }

  const ratings = active.map((entry) => entry.effectiveness).filter(validRating);
  if (ratings.length > 0) {
    const average = ratings.reduce((total, rating) => total + rating, 0) / ratings.length;
    lines.push(
      `Overall average effectiveness: ${roundToTenth(average).toFixed(1)}/5`,
      `Supports rated 3.5+: ${ratings.filter((rating) => rating >= 3.5).length}`,
      `Supports rated below 3.0: ${ratings.filter((rating) => rating < 3).length}`
    );
  }

  return lines.join('\n');
}
