import { z } from 'zod';
import { datetimeSchema, idSchema } from './common.js';

export const versionTypeSchema = z.enum(['release', 'beta', 'alpha']);
export type VersionType = z.infer<typeof versionTypeSchema>;

export const dependencyTypeSchema = z.enum(['required', 'optional', 'incompatible', 'embedded']);
export type DependencyType = z.infer<typeof dependencyTypeSchema>;

export const dependencySchema = z.object({
  version_id: idSchema.nullish(),
  project_id: idSchema.nullish(),
  file_name: z.string().nullish(),
  dependency_type: dependencyTypeSchema,
});
export type Dependency = z.infer<typeof dependencySchema>;

export const versionFileSchema = z.object({
  hashes: z.object({
    sha1: z.string(),
    sha512: z.string(),
  }),
  url: z.string().url(),
  filename: z.string(),
  primary: z.boolean(),
  size: z.number().int().nonnegative(),
  file_type: z.string().nullish(),
});
export type VersionFile = z.infer<typeof versionFileSchema>;

export const versionSchema = z.object({
  id: idSchema,
  project_id: idSchema,
  author_id: idSchema,
  name: z.string(),
  version_number: z.string(),
  changelog: z.string().nullish(),
  featured: z.boolean(),
  date_published: datetimeSchema,
  downloads: z.number().int(),
  version_type: versionTypeSchema,
  status: z.string().optional(),
  files: z.array(versionFileSchema),
  dependencies: z.array(dependencySchema).default([]),
  game_versions: z.array(z.string()),
  loaders: z.array(z.string()),
});
export type Version = z.infer<typeof versionSchema>;
