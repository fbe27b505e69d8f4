import { z } from 'zod';
import type { ModrinthError } from '../error/types.js';
import {
  type Category,
  categorySchema,
  type DonationPlatform,
  donationPlatformSchema,
  type GameVersion,
  gameVersionSchema,
  type Loader,
  loaderSchema,
  tagListSchema,
} from '../structures/tag.js';
import type { CallOptions } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { ResourceApi } from './resource.js';

/**
 * Static lists the platform uses to tag projects and versions.
 */
export class TagApi extends ResourceApi {
  categories(opts?: CallOptions): SafeWrapAsync<ModrinthError, Category[]> {
    return this.read({ segments: ['tag', 'category'] }, z.array(categorySchema), opts);
  }

  loaders(opts?: CallOptions): SafeWrapAsync<ModrinthError, Loader[]> {
    return this.read({ segments: ['tag', 'loader'] }, z.array(loaderSchema), opts);
  }

  gameVersions(opts?: CallOptions): SafeWrapAsync<ModrinthError, GameVersion[]> {
    return this.read({ segments: ['tag', 'game_version'] }, z.array(gameVersionSchema), opts);
  }

  donationPlatforms(opts?: CallOptions): SafeWrapAsync<ModrinthError, DonationPlatform[]> {
    return this.read({ segments: ['tag', 'donation_platform'] }, z.array(donationPlatformSchema), opts);
  }

  /** Valid `report_type` values of a report submission. */
  reportTypes(opts?: CallOptions): SafeWrapAsync<ModrinthError, string[]> {
    return this.read({ segments: ['tag', 'report_type'] }, tagListSchema, opts);
  }

  projectTypes(opts?: CallOptions): SafeWrapAsync<ModrinthError, string[]> {
    return this.read({ segments: ['tag', 'project_type'] }, tagListSchema, opts);
  }

  sideTypes(opts?: CallOptions): SafeWrapAsync<ModrinthError, string[]> {
    return this.read({ segments: ['tag', 'side_type'] }, tagListSchema, opts);
  }
}
