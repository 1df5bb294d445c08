/**
 * Payload models for remindctl JSON output
 *
 * Every payload is validated at the parse boundary; schema drift becomes a
 * parse_error instead of leaking half-typed objects into the server.
 */

import { z } from 'zod';

export const ReminderSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  listID: z.string(),
  listName: z.string(),
  isCompleted: z.boolean(),
  priority: z.string().default('none'),
  dueDate: z.string().nullish().transform((value) => value ?? null),
  notes: z.string().nullish().transform((value) => value ?? ''),
});

export const ReminderListSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  reminderCount: z.number().int().nullish(),
  overdueCount: z.number().int().nullish(),
});

export const RemindctlStatusSchema = z.object({
  authorized: z.boolean(),
  status: z.string(),
});

export type Reminder = z.infer<typeof ReminderSchema>;
export type ReminderList = z.infer<typeof ReminderListSchema>;
export type RemindctlStatus = z.infer<typeof RemindctlStatusSchema>;

/**
 * Priority values understood by remindctl
 */
export const PRIORITIES = ['none', 'low', 'medium', 'high'] as const;
export type ReminderPriority = (typeof PRIORITIES)[number];
