import { z } from 'zod';
import type { ModrinthError } from '../error/types.js';
import {
  type Project,
  type ProjectDependencies,
  projectDependenciesSchema,
  projectIdSchema,
  projectSchema,
  type SearchIndex,
  type SearchResults,
  searchResultsSchema,
} from '../structures/project.js';
import type { CallOptions } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { ResourceApi } from './resource.js';

/** Filters of `GET /search`, all optional. */
export interface SearchFilters {
  /** Free text query. */
  query?: string;
  /**
   * Facets in conjunctive normal form: the inner lists are OR-ed, the outer list AND-ed.
   * @example [['categories:fabric'], ['versions:1.20.1', 'versions:1.20.4']]
   */
  facets?: readonly (readonly string[])[];
  /** Sort order. */
  index?: SearchIndex;
  /** Number of hits to skip. */
  offset?: number;
  /** Number of hits to return. */
  limit?: number;
}

export class ProjectApi extends ResourceApi {
  /**
   * Get the project with ID or slug `projectId`.
   *
   * @example
   * const [err, sodium] = await client.projects.get('AANobbMI');
   */
  get(projectId: string, opts?: CallOptions): SafeWrapAsync<ModrinthError, Project> {
    return this.read({ segments: ['project', projectId], ids: [projectId] }, projectSchema, opts);
  }

  /** Get several projects in one request, in no particular order. */
  getMultiple(projectIds: readonly string[], opts?: CallOptions): SafeWrapAsync<ModrinthError, Project[]> {
    return this.batch('projects', projectIds, z.array(projectSchema), opts);
  }

  /**
   * Resolve a slug or ID to the canonical project ID. An unknown project is an
   * `ApiError` with status 404.
   */
  async checkValidity(projectId: string, opts?: CallOptions): SafeWrapAsync<ModrinthError, string> {
    const [err, result] = await this.read(
      { segments: ['project', projectId, 'check'], ids: [projectId] },
      projectIdSchema,
      opts,
    );
    if (err) {
      return [err, null];
    }

    return [null, result.id];
  }

  /** Projects and versions the project depends on. */
  getDependencies(projectId: string, opts?: CallOptions): SafeWrapAsync<ModrinthError, ProjectDependencies> {
    return this.read(
      { segments: ['project', projectId, 'dependencies'], ids: [projectId] },
      projectDependenciesSchema,
      opts,
    );
  }

  /** Search projects. `offset` and `limit` are passed through as given. */
  search(filters: SearchFilters = {}, opts?: CallOptions): SafeWrapAsync<ModrinthError, SearchResults> {
    return this.read(
      {
        segments: ['search'],
        query: [
          ['query', filters.query],
          ['facets', filters.facets],
          ['index', filters.index],
          ['offset', filters.offset],
          ['limit', filters.limit],
        ],
      },
      searchResultsSchema,
      opts,
    );
  }
}
