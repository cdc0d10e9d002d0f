export { generalize, generalizeStrength, generalizeGoal } from './generalizer.js';
export { STRENGTH_THEMES, GOAL_THEMES, type ThemeRule } from './tables.js';
