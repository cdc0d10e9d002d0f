import { GOAL_THEMES, STRENGTH_THEMES, type ThemeRule } from './tables.js';

const FALLBACK_WORDS = 5;

/**
 * Maps free text onto a broad theme. Without a matching rule the first five
 * words are kept, which strips most detail but is not a closed vocabulary.
 */
export function generalize(text: string, table: readonly ThemeRule[]): string {
  for (const [pattern, theme] of table) {
    if (pattern.test(text)) {
      return theme;
    }
  }

  const words = text.split(/\s+/).filter(Boolean);
  const head = words.slice(0, FALLBACK_WORDS).join(' ');
  return words.length > FALLBACK_WORDS ? `${head}...` : head;
}

export function generalizeStrength(text: string): string {
  return generalize(text, STRENGTH_THEMES);
}

export function generalizeGoal(text: string): string {
  return generalize(text, GOAL_THEMES);
}
