import { z } from 'zod';
import { datetimeSchema, idSchema } from './common.js';

/** Roles a user may hold on the platform. */
export const UserRole = {
  Admin: 'admin',
  Moderator: 'moderator',
  Developer: 'developer',
} as const;
export type UserRole = (typeof UserRole)[keyof typeof UserRole];

export const userSchema = z.object({
  id: idSchema,
  role: z.nativeEnum(UserRole),
  username: z.string().optional(),
  name: z.string().nullish(),
  /** Only visible to the user themselves */
  email: z.string().nullish(),
  bio: z.string().nullish(),
  avatar_url: z.string().nullish(),
  created: datetimeSchema.optional(),
  badges: z.number().int().optional(),
  github_id: z.number().int().nullish(),
});
export type User = z.infer<typeof userSchema>;

export const notificationActionSchema = z.object({
  title: z.string(),
  /** HTTP method and route to call to take the action */
  action_route: z.tuple([z.string(), z.string()]),
});

export const notificationSchema = z.object({
  id: idSchema,
  user_id: idSchema,
  type: z.string().nullish(),
  title: z.string(),
  text: z.string(),
  link: z.string(),
  read: z.boolean(),
  created: datetimeSchema,
  actions: z.array(notificationActionSchema).default([]),
});
export type Notification = z.infer<typeof notificationSchema>;

/** Kinds of items a report can be filed against. */
export const reportItemTypeSchema = z.enum(['project', 'user', 'version']);
export type ReportItemType = z.infer<typeof reportItemTypeSchema>;

/** Body of `POST /report`. */
export interface ReportSubmission {
  /** One of the report types listed by `tags.reportTypes()` */
  report_type: string;
  item_id: string;
  item_type: ReportItemType;
  body: string;
}

export const reportSchema = z.object({
  id: idSchema.optional(),
  report_type: z.string(),
  item_id: idSchema,
  item_type: reportItemTypeSchema,
  body: z.string(),
  reporter: idSchema.optional(),
  created: datetimeSchema.optional(),
  closed: z.boolean().optional(),
});
export type Report = z.infer<typeof reportSchema>;
