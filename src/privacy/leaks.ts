import type { SafeView, StudentProfile, SupportEntry } from '../types/index.js';
import { itemText } from './full-context.js';

export interface LeakFinding {
  source: 'strength' | 'goal' | 'history' | 'stakeholder' | 'support';
  text: string;
}

// Values shorter than this are too generic to count as a verbatim leak
const MIN_LEAK_LENGTH = 12;

/**
 * Reports free-text entries whose full text appears verbatim in the safe
 * view. Rule-based themes never trigger this; the word-prefix fallback can,
 * for short unmatched entries.
 */
export function findLeaks(
  safeView: SafeView,
  profile: StudentProfile,
  supports: readonly SupportEntry[]
): LeakFinding[] {
  const haystack = JSON.stringify(safeView).toLowerCase();
  const findings: LeakFinding[] = [];

  const check = (source: LeakFinding['source'], text: string): void => {
    const needle = text.trim().toLowerCase();
    if (needle.length >= MIN_LEAK_LENGTH && haystack.includes(needle)) {
      findings.push({ source, text });
    }
  };

  for (const item of profile.strengths ?? []) check('strength', itemText(item));
  for (const item of profile.goals ?? []) check('goal', itemText(item));
  for (const item of profile.history ?? []) check('history', itemText(item));
  for (const item of profile.stakeholders ?? []) check('stakeholder', itemText(item));
  for (const entry of supports) check('support', entry.description);

  return findings;
}
