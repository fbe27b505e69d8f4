import { z } from 'zod';
import { datetimeSchema } from './common.js';

export const categorySchema = z.object({
  /** SVG markup of the icon */
  icon: z.string(),
  name: z.string(),
  project_type: z.string(),
  header: z.string(),
});
export type Category = z.infer<typeof categorySchema>;

export const loaderSchema = z.object({
  icon: z.string(),
  name: z.string(),
  supported_project_types: z.array(z.string()),
});
export type Loader = z.infer<typeof loaderSchema>;

export const gameVersionSchema = z.object({
  version: z.string(),
  version_type: z.enum(['release', 'snapshot', 'alpha', 'beta']),
  date: datetimeSchema,
  major: z.boolean(),
});
export type GameVersion = z.infer<typeof gameVersionSchema>;

export const donationPlatformSchema = z.object({
  short: z.string(),
  name: z.string(),
});
export type DonationPlatform = z.infer<typeof donationPlatformSchema>;

/** Report types, project types and side types are plain string lists. */
export const tagListSchema = z.array(z.string());
