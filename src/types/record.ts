// A profile list item is either bare text or text with a caller-assigned priority
export type ProfileItem = string | { text: string; priority?: number };

export interface StudentProfile {
  displayName: string;
  strengths?: ProfileItem[];
  goals?: ProfileItem[];
  history?: ProfileItem[];
  stakeholders?: ProfileItem[];
}

export type SupportStatus = 'active' | 'paused' | 'ended' | (string & {});

export interface SupportEntry {
  category: string;
  subcategory?: string | null;
  description: string;
  /** Dict of lists, flat list, single string, or a JSON string of any of these. */
  udlTags?: unknown;
  pourTags?: unknown;
  status: SupportStatus;
  /** A number from 1 to 5 counts; any other value is left out of averages. */
  effectiveness?: unknown;
}

export interface ActivityLog {
  role: string;
  implementationNote?: string | null;
  outcomeNote?: string | null;
  timestamp: string;
}

export interface StudentRecord {
  profile: StudentProfile;
  supports: SupportEntry[];
  activityLogs?: ActivityLog[];
}

export interface SafeView {
  firstNameOnly: string;
  supportCategories: string[];
  categoryCounts: Record<string, number>;
  strengthThemes: string[];
  goalThemes: string[];
  activeSupportCount: number;
  udlPrinciples: string[];
  pourPrinciples: string[];
  effectivenessByCategory: Record<string, number>;
}

export interface FullView {
  confidentialText: string;
}

export interface AggregateResult {
  safeView: SafeView;
  fullView: FullView;
}
