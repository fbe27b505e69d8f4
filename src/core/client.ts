import { ProjectApi } from '../api/project.js';
import { TagApi } from '../api/tag.js';
import { UserApi } from '../api/user.js';
import { VersionApi } from '../api/version.js';
import type { ConfigError } from '../error/configError.js';
import type { ClientConfig } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';
import { type ClientConfigProps, createClientConfig } from './config.js';
import { Dispatcher } from './dispatcher.js';

/**
 * Typed client of the v2 REST API that:
 * - validates identifiers before anything is sent,
 * - builds paths and query strings from typed arguments,
 * - decodes every response against a schema.
 *
 * All calls resolve to error-first tuples, none of them throws.
 *
 * @example
 * const [errClient, client] = ModrinthClient.create({ userAgent: { name: 'my-launcher', version: '1.2.0' } });
 * if (errClient) throw errClient;
 *
 * const [err, versions] = await client.versions.list('AANobbMI', { loaders: ['fabric'] });
 */
export class ModrinthClient {
  /** Users, their projects, follows, notifications and reports. */
  readonly users: UserApi;
  /** Projects, dependencies and search. */
  readonly projects: ProjectApi;
  /** Versions of projects and file lookups. */
  readonly versions: VersionApi;
  /** Static tag lists. */
  readonly tags: TagApi;
  /** Configuration every call of this client reads. */
  readonly config: ClientConfig;

  /**
   * Creates a client from a configuration built by {@link createClientConfig}.
   * Use {@link ModrinthClient.create} to build both in one step.
   */
  constructor(config: ClientConfig) {
    const dispatcher = new Dispatcher(config);

    this.config = config;
    this.users = new UserApi(dispatcher);
    this.projects = new ProjectApi(dispatcher);
    this.versions = new VersionApi(dispatcher);
    this.tags = new TagApi(dispatcher);
  }

  /**
   * Validates `props` and returns a ready client, or the {@link ConfigError}
   * naming the field that was rejected.
   */
  static create(props: ClientConfigProps = {}): SafeWrap<ConfigError, ModrinthClient> {
    const [err, config] = createClientConfig(props);
    if (err) {
      return [err, null];
    }

    return [null, new ModrinthClient(config)];
  }
}
