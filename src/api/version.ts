import { z } from 'zod';
import type { ModrinthError } from '../error/types.js';
import { type Version, versionSchema } from '../structures/version.js';
import type { CallOptions } from '../types/request.js';
import { type HashAlgorithm, validateHash } from '../utils/identifier.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { ResourceApi } from './resource.js';

/** Optional filters of a project's version list. */
export interface VersionFilters {
  /** Only versions for these loaders, e.g. `['fabric']`. */
  loaders?: readonly string[];
  /** Only versions for these game versions, e.g. `['1.20.1']`. */
  gameVersions?: readonly string[];
  /** Only featured, or only non-featured, versions. */
  featured?: boolean;
}

export class VersionApi extends ResourceApi {
  /**
   * List the versions of a project, optionally filtered.
   *
   * @example
   * const [err, forgeVersions] = await client.versions.list('AANobbMI', { loaders: ['forge'] });
   */
  list(projectId: string, filters: VersionFilters = {}, opts?: CallOptions): SafeWrapAsync<ModrinthError, Version[]> {
    return this.read(
      {
        segments: ['project', projectId, 'version'],
        ids: [projectId],
        query: [
          ['loaders', filters.loaders],
          ['game_versions', filters.gameVersions],
          ['featured', filters.featured],
        ],
      },
      z.array(versionSchema),
      opts,
    );
  }

  /** Get the version with ID `versionId`. */
  get(versionId: string, opts?: CallOptions): SafeWrapAsync<ModrinthError, Version> {
    return this.read({ segments: ['version', versionId], ids: [versionId] }, versionSchema, opts);
  }

  /** Get several versions in one request, in no particular order. */
  getMultiple(versionIds: readonly string[], opts?: CallOptions): SafeWrapAsync<ModrinthError, Version[]> {
    return this.batch('versions', versionIds, z.array(versionSchema), opts);
  }

  /**
   * Get the version a file belongs to, from the hex digest of the file.
   */
  async getFromHash(
    hash: string,
    algorithm: HashAlgorithm = 'sha1',
    opts?: CallOptions,
  ): SafeWrapAsync<ModrinthError, Version> {
    const [errHash] = validateHash(hash, algorithm);
    if (errHash) {
      return [errHash, null];
    }

    return this.read({ segments: ['version_file', hash], query: [['algorithm', algorithm]] }, versionSchema, opts);
  }
}
