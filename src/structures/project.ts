import { z } from 'zod';
import { datetimeSchema, idSchema, sideTypeSchema } from './common.js';
import { versionSchema } from './version.js';

export const projectTypeSchema = z.enum(['mod', 'modpack', 'resourcepack', 'shader', 'plugin', 'datapack']);
export type ProjectType = z.infer<typeof projectTypeSchema>;

export const licenseSchema = z.object({
  id: z.string(),
  name: z.string(),
  url: z.string().nullish(),
});
export type License = z.infer<typeof licenseSchema>;

export const projectSchema = z.object({
  id: idSchema,
  slug: z.string(),
  project_type: projectTypeSchema,
  team: idSchema,
  title: z.string(),
  description: z.string(),
  body: z.string().optional(),
  categories: z.array(z.string()),
  additional_categories: z.array(z.string()).default([]),
  client_side: sideTypeSchema,
  server_side: sideTypeSchema,
  status: z.string(),
  downloads: z.number().int(),
  followers: z.number().int(),
  published: datetimeSchema,
  updated: datetimeSchema,
  license: licenseSchema.optional(),
  versions: z.array(idSchema).default([]),
  game_versions: z.array(z.string()).default([]),
  loaders: z.array(z.string()).default([]),
  icon_url: z.string().nullish(),
  source_url: z.string().nullish(),
  issues_url: z.string().nullish(),
  wiki_url: z.string().nullish(),
  discord_url: z.string().nullish(),
});
export type Project = z.infer<typeof projectSchema>;

/** Answer of the slug/ID check route: the canonical ID. */
export const projectIdSchema = z.object({ id: idSchema });

export const projectDependenciesSchema = z.object({
  projects: z.array(projectSchema),
  versions: z.array(versionSchema),
});
export type ProjectDependencies = z.infer<typeof projectDependenciesSchema>;

/** Sort orders accepted by search. */
export const searchIndexSchema = z.enum(['relevance', 'downloads', 'follows', 'newest', 'updated']);
export type SearchIndex = z.infer<typeof searchIndexSchema>;

export const searchHitSchema = z.object({
  project_id: idSchema,
  slug: z.string().nullish(),
  project_type: projectTypeSchema,
  author: z.string(),
  title: z.string(),
  description: z.string(),
  categories: z.array(z.string()).default([]),
  display_categories: z.array(z.string()).default([]),
  versions: z.array(z.string()).default([]),
  downloads: z.number().int(),
  follows: z.number().int(),
  icon_url: z.string().nullish(),
  date_created: datetimeSchema,
  date_modified: datetimeSchema,
  latest_version: z.string().nullish(),
  license: z.string(),
  client_side: sideTypeSchema,
  server_side: sideTypeSchema,
});
export type SearchHit = z.infer<typeof searchHitSchema>;

export const searchResultsSchema = z.object({
  hits: z.array(searchHitSchema),
  offset: z.number().int(),
  limit: z.number().int(),
  total_hits: z.number().int(),
});
export type SearchResults = z.infer<typeof searchResultsSchema>;
