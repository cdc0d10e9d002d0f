import { describe, expect, it } from 'vitest';
import { buildSupportSummary } from '../../src/privacy/index.js';
import type { ActivityLog, SupportEntry } from '../../src/types/index.js';

const supports: SupportEntry[] = [
  {
    category: 'sensory',
    subcategory: 'noise',
    description: 'Noise-cancelling headphones',
    status: 'active',
    effectiveness: 4,
    udlTags: ['7.3 Minimize threats']
  },
  {
    category: 'cognitive',
    description: 'Visual timetable',
    status: 'active',
    effectiveness: 2,
    pourTags: '{"Understandable":["3.3"]}'
  },
  { category: 'motor', description: 'Slant board', status: 'active' },
  { category: 'sensory', description: 'Fidget tool', status: 'ended', effectiveness: 5 }
];

const logs: ActivityLog[] = [
  {
    role: 'aide',
    implementationNote: 'Used headphones in assembly',
    outcomeNote: 'Stayed for the whole assembly',
    timestamp: '2024-03-01T08:30:00Z'
  },
  { role: 'teacher', implementationNote: '', outcomeNote: 'x'.repeat(310), timestamp: '2024-03-05T14:05:00Z' },
  { role: 'parent', timestamp: 'soon' }
];

describe('buildSupportSummary', () => {
  it('lists active supports, every log newest first and rating counts', () => {
    const summary = buildSupportSummary({ displayName: 'Maya Lin Torres' }, supports, logs);

    expect(summary.split('\n')).toEqual([
      'Student first name: Maya',
      '',
      'Active supports: 3',
      '',
      '-- Support Entries --',
      '  [sensory/noise] Noise-cancelling headphones (effectiveness: 4/5)',
      '    UDL: ["7.3 Minimize threats"]',
      '  [cognitive/general] Visual timetable (effectiveness: 2/5)',
      '    POUR: {"Understandable":["3.3"]}',
      '  [motor/general] Slant board (no rating yet)',
      '',
      '-- Tracking Logs (3 entries) --',
      '  2024-03-05 14:05 [teacher]',
      `    Outcome: ${'x'.repeat(300)}`,
      '  2024-03-01 08:30 [aide]',
      '    Implementation: Used headphones in assembly',
      '    Outcome: Stayed for the whole assembly',
      '  unknown [parent]',
      '',
      'Overall average effectiveness: 3.0/5',
      'Supports rated 3.5+: 1',
      'Supports rated below 3.0: 1'
    ]);
  });

  it('leaves out history and stakeholders', () => {
    const summary = buildSupportSummary(
      {
        displayName: 'Maya Lin Torres',
        history: ['Diagnosed in 2019'],
        stakeholders: ['Dr. Okafor']
      },
      supports,
      logs
    );

    expect(summary).not.toContain('Diagnosed in 2019');
    expect(summary).not.toContain('Okafor');
    expect(summary).not.toContain('Torres');
  });

  it('has only the header without supports or logs', () => {
    expect(buildSupportSummary({ displayName: '  ' }, [])).toBe('Student first name: Student\n\nActive supports: 0\n');
  });

  it('rounds the overall average half to even', () => {
    const rated = (effectiveness: number): SupportEntry => ({
      category: 'sensory',
      description: 'Ear defenders',
      status: 'active',
      effectiveness
    });
    const summary = buildSupportSummary({ displayName: 'Ari' }, [rated(4), rated(4), rated(4), rated(5)]);

    expect(summary.split('\n').slice(-3)).toEqual([
      'Overall average effectiveness: 4.2/5',
      'Supports rated 3.5+: 4',
      'Supports rated below 3.0: 0'
    ]);
  });
});
