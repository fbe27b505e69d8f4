import { describe, expect, it } from 'vitest';
import { createStubService } from '../../test/stubService.js';
import { ProjectApi } from '../api/project.js';
import { TagApi } from '../api/tag.js';
import { UserApi } from '../api/user.js';
import { VersionApi } from '../api/version.js';
import { ConfigError } from '../error/configError.js';
import { ModrinthClient } from './client.js';
import { createClientConfig } from './config.js';

describe('ModrinthClient', () => {
  it('exposes the resource APIs', () => {
    const [err, client] = ModrinthClient.create();

    expect(err).toBeNull();
    expect(client?.users).toBeInstanceOf(UserApi);
    expect(client?.projects).toBeInstanceOf(ProjectApi);
    expect(client?.versions).toBeInstanceOf(VersionApi);
    expect(client?.tags).toBeInstanceOf(TagApi);
  });

  it('returns the ConfigError of invalid properties', () => {
    const [err, client] = ModrinthClient.create({ baseUrl: 'not a url' });

    expect(client).toBeNull();
    expect(err).toBeInstanceOf(ConfigError);
    expect(err?.field).toBe('baseUrl');
  });

  it('runs on a configuration built up front', async () => {
    const stub = createStubService();
    const [errConfig, config] = createClientConfig({ fetch: stub.fetch, baseUrl: 'https://staging.example.test/v2' });
    if (errConfig) {
      throw errConfig;
    }

    const client = new ModrinthClient(config);
    const [err, loaders] = await client.tags.loaders();

    expect(client.config).toBe(config);
    expect(err).toBeNull();
    expect(loaders).toHaveLength(2);
    expect(stub.requests[0]?.url.href).toBe('https://staging.example.test/v2/tag/loader');
  });
});
