import { z } from 'zod';
import type { StudentRecord } from '../types/index.js';

const ProfileItemSchema = z.union([
  z.string(),
  z.object({ text: z.string(), priority: z.number().optional() })
]);

const SupportEntrySchema = z.object({
  category: z.string(),
  subcategory: z.string().nullish(),
  description: z.string(),
  udlTags: z.unknown().optional(),
  pourTags: z.unknown().optional(),
  status: z.string().catch(''),
  effectiveness: z.unknown().optional()
});

const ActivityLogSchema = z.object({
  role: z.string(),
  implementationNote: z.string().nullish(),
  outcomeNote: z.string().nullish(),
  timestamp: z.string().catch('')
});

export const StudentRecordSchema: z.ZodType<StudentRecord, z.ZodTypeDef, unknown> = z.object({
  profile: z.object({
    displayName: z.string(),
    strengths: z.array(ProfileItemSchema).optional(),
    goals: z.array(ProfileItemSchema).optional(),
    history: z.array(ProfileItemSchema).optional(),
    stakeholders: z.array(ProfileItemSchema).optional()
  }),
  supports: z.array(SupportEntrySchema).default([]),
  activityLogs: z.array(ActivityLogSchema).optional()
});
