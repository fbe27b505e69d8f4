import { pino } from 'pino';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createStubService } from '../../test/stubService.js';
import { ApiError } from '../error/apiError.js';
import { DecodeError } from '../error/decodeError.js';
import { SerializationError } from '../error/serializationError.js';
import { TransportError } from '../error/transportError.js';
import { userSchema } from '../structures/user.js';
import type { FetchClientProviderDefinition, FetchImplementation } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type ClientConfigProps, createClientConfig } from './config.js';
import { Dispatcher } from './dispatcher.js';

const REPORT_TYPES = ['spam', 'copyright', 'inappropriate', 'malicious'];

function createDispatcher(props: ClientConfigProps = {}) {
  const stub = createStubService();
  const [err, config] = createClientConfig({ fetch: stub.fetch, ...props });
  if (err) {
    throw err;
  }

  return { dispatcher: new Dispatcher(config), requests: stub.requests };
}

function respondWith(response: () => Response): FetchImplementation {
  return () => Promise.resolve(response());
}

const url = (path: string) => new URL(path, 'https://api.modrinth.com/v2/');

describe('Dispatcher', () => {
  describe('headers', () => {
    it('sends Accept and User-Agent, and no Authorization without a token', async () => {
      const { dispatcher, requests } = createDispatcher();

      const [err, types] = await dispatcher.get(url('tag/report_type'), z.array(z.string()));

      expect(err).toBeNull();
      expect(types).toEqual(REPORT_TYPES);
      expect(requests).toHaveLength(1);
      expect(requests[0]?.method).toBe('GET');
      expect(requests[0]?.headers.get('accept')).toBe('application/json');
      expect(requests[0]?.headers.get('user-agent')).toBe('modrinth-typed/0.3.0');
      expect(requests[0]?.headers.get('authorization')).toBeNull();
    });

    it('sends the raw token as Authorization', async () => {
      const { dispatcher, requests } = createDispatcher({ token: 'test-secret' });

      await dispatcher.get(url('tag/report_type'), z.array(z.string()));

      expect(requests[0]?.headers.get('authorization')).toBe('test-secret');
    });

    it('renders the configured user agent', async () => {
      const { dispatcher, requests } = createDispatcher({
        userAgent: { name: 'test-launcher', version: '2.1.0', contact: 'dev@example.test' },
      });

      await dispatcher.get(url('tag/report_type'), z.array(z.string()));

      expect(requests[0]?.headers.get('user-agent')).toBe('test-launcher/2.1.0 (dev@example.test)');
    });

    it('merges per-call headers over the defaults, null removing one', async () => {
      const { dispatcher, requests } = createDispatcher({ token: 'test-secret' });

      await dispatcher.get(url('tag/report_type'), z.array(z.string()), {
        headers: { Authorization: null, 'X-Trace': 'trace-1' },
      });

      expect(requests[0]?.headers.get('authorization')).toBeNull();
      expect(requests[0]?.headers.get('x-trace')).toBe('trace-1');
      expect(requests[0]?.headers.get('accept')).toBe('application/json');
    });
  });

  describe('POST', () => {
    it('serializes the body as JSON with a content type', async () => {
      const { dispatcher, requests } = createDispatcher({ token: 'test-secret' });
      const report = { report_type: 'spam', item_id: 'AANobbMI', item_type: 'project', body: 'test report' };

      const [err, created] = await dispatcher.post(url('report'), report, z.object({ id: z.string() }));

      expect(err).toBeNull();
      expect(created).toEqual({ id: 'RPt0001a' });
      expect(requests[0]?.method).toBe('POST');
      expect(requests[0]?.body).toBe(JSON.stringify(report));
      expect(requests[0]?.headers.get('content-type')).toBe('application/json');
    });

    it('returns a SerializationError without sending for a body JSON cannot encode', async () => {
      const { dispatcher, requests } = createDispatcher({ token: 'test-secret' });

      const [err, data] = await dispatcher.post(url('report'), { size: 10n }, z.unknown());

      expect(data).toBeNull();
      expect(err).toBeInstanceOf(SerializationError);
      expect(err?.message).toBe('error serializing request body for https://api.modrinth.com/v2/report');
      expect(err?.cause).toBeInstanceOf(TypeError);
      expect(requests).toHaveLength(0);
    });
  });

  describe('transport failures', () => {
    it('returns a TransportError when fetch rejects', async () => {
      const cause = new TypeError('fetch failed');
      const [errConfig, config] = createClientConfig({ fetch: () => Promise.reject(cause) });
      if (errConfig) {
        throw errConfig;
      }

      const [err, data] = await new Dispatcher(config).get(url('tag/loader'), z.unknown());

      expect(data).toBeNull();
      expect(err).toBeInstanceOf(TransportError);
      expect(err instanceof TransportError && err.method).toBe('GET');
      expect(err instanceof TransportError && err.url).toBe('https://api.modrinth.com/v2/tag/loader');
      expect(err?.cause).toBe(cause);
    });

    it('returns a TransportError when the provider throws instead of returning a tuple', async () => {
      class ThrowingProvider implements FetchClientProviderDefinition {
        get(): SafeWrapAsync<TransportError, Response> {
          throw new Error('provider broke');
        }

        post(): SafeWrapAsync<TransportError, Response> {
          throw new Error('provider broke');
        }
      }
      const [errConfig, config] = createClientConfig({ fetchProvider: ThrowingProvider });
      if (errConfig) {
        throw errConfig;
      }

      const [err] = await new Dispatcher(config).get(url('tag/loader'), z.unknown());

      expect(err).toBeInstanceOf(TransportError);
      expect(err?.message).toBe('error calling transport GET');
      expect(err?.cause).toEqual(new Error('provider broke'));
    });

    it('returns a TransportError when the body cannot be read', async () => {
      const [errConfig, config] = createClientConfig({
        fetch: respondWith(
          () =>
            new Response(
              new ReadableStream({
                start(controller) {
                  controller.error(new Error('stream broke'));
                },
              }),
            ),
        ),
      });
      if (errConfig) {
        throw errConfig;
      }

      const [err] = await new Dispatcher(config).get(url('tag/loader'), z.unknown());

      expect(err).toBeInstanceOf(TransportError);
      expect(err?.message).toBe('error reading response body of https://api.modrinth.com/v2/tag/loader');
    });
  });

  describe('responses', () => {
    it('returns a DecodeError with the raw body when a 200 does not match the schema', async () => {
      const { dispatcher } = createDispatcher();

      const [err, data] = await dispatcher.get(url('tag/report_type'), z.array(z.number()));

      expect(data).toBeNull();
      expect(err).toBeInstanceOf(DecodeError);
      expect(err instanceof DecodeError && err.body).toBe(JSON.stringify(REPORT_TYPES));
      expect(err instanceof DecodeError && err.issues).toHaveLength(4);
    });

    it.each([null, 0, true, 'yesterday'])('returns a DecodeError for the timestamp %j', async (created) => {
      const body = JSON.stringify({ id: 'TEZXhE2U', role: 'developer', created });
      const [errConfig, config] = createClientConfig({ fetch: respondWith(() => new Response(body)) });
      if (errConfig) {
        throw errConfig;
      }

      const [err, user] = await new Dispatcher(config).get(url('user/TEZXhE2U'), userSchema);

      expect(user).toBeNull();
      expect(err).toBeInstanceOf(DecodeError);
      expect(err instanceof DecodeError && err.issues[0]?.path).toEqual(['created']);
    });

    it('decodes a timestamp with an offset', async () => {
      const body = JSON.stringify({ id: 'TEZXhE2U', role: 'developer', created: '2021-01-15T12:00:00+02:00' });
      const [errConfig, config] = createClientConfig({ fetch: respondWith(() => new Response(body)) });
      if (errConfig) {
        throw errConfig;
      }

      const [err, user] = await new Dispatcher(config).get(url('user/TEZXhE2U'), userSchema);

      expect(err).toBeNull();
      expect(user?.created).toEqual(new Date('2021-01-15T10:00:00.000Z'));
    });

    it('returns a DecodeError when a 200 body is not JSON', async () => {
      const [errConfig, config] = createClientConfig({ fetch: respondWith(() => new Response('<html></html>')) });
      if (errConfig) {
        throw errConfig;
      }

      const [err] = await new Dispatcher(config).get(url('tag/loader'), z.unknown());

      expect(err).toBeInstanceOf(DecodeError);
      expect(err?.message).toBe('error parsing json response body');
      expect(err?.cause).toBeInstanceOf(SyntaxError);
    });

    it('decodes an empty success body as null', async () => {
      const [errConfig, config] = createClientConfig({
        fetch: respondWith(() => new Response(null, { status: 204 })),
      });
      if (errConfig) {
        throw errConfig;
      }

      const [err, data] = await new Dispatcher(config).get(url('user/TEZXhE2U/follow'), z.null());

      expect(err).toBeNull();
      expect(data).toBeNull();
    });

    it('turns the error payload of a 404 into an ApiError', async () => {
      const { dispatcher } = createDispatcher();

      const [err, data] = await dispatcher.get(url('user/unknown'), z.unknown());

      expect(data).toBeNull();
      expect(err).toBeInstanceOf(ApiError);
      expect(err instanceof ApiError && err.status).toBe(404);
      expect(err instanceof ApiError && err.reason).toBe('the requested route does not exist');
      expect(err instanceof ApiError && err.code).toBe('not_found');
      expect(err?.message).toBe('error response 404 (not_found): the requested route does not exist');
    });

    it('reports a missing token as a 401 ApiError', async () => {
      const { dispatcher } = createDispatcher();

      const [err] = await dispatcher.get(url('user'), z.unknown());

      expect(err instanceof ApiError && err.status).toBe(401);
      expect(err instanceof ApiError && err.code).toBe('unauthorized');
    });

    it('falls back to the error code when the payload has no description', async () => {
      const [errConfig, config] = createClientConfig({
        fetch: respondWith(() => new Response('{"error":"ratelimit_error"}', { status: 429 })),
      });
      if (errConfig) {
        throw errConfig;
      }

      const [err] = await new Dispatcher(config).get(url('tag/loader'), z.unknown());

      expect(err instanceof ApiError && err.status).toBe(429);
      expect(err instanceof ApiError && err.reason).toBe('ratelimit_error');
      expect(err instanceof ApiError && err.code).toBe('ratelimit_error');
    });

    it('keeps the raw text of an error body that is not the error payload', async () => {
      const [errConfig, config] = createClientConfig({
        fetch: respondWith(() => new Response('upstream timed out', { status: 502 })),
      });
      if (errConfig) {
        throw errConfig;
      }

      const [err] = await new Dispatcher(config).get(url('tag/loader'), z.unknown());

      expect(err).toBeInstanceOf(ApiError);
      expect(err instanceof ApiError && err.status).toBe(502);
      expect(err instanceof ApiError && err.reason).toBe('upstream timed out');
      expect(err instanceof ApiError && err.code).toBeNull();
    });
  });

  describe('logging', () => {
    it('writes debug records to the configured logger', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
      const { dispatcher } = createDispatcher({ logger });

      await dispatcher.get(url('tag/report_type'), z.array(z.string()));
      await dispatcher.get(url('user/unknown'), z.unknown());

      const records = lines.map((line) => z.object({ msg: z.string(), component: z.string() }).passthrough().parse(JSON.parse(line)));
      expect(records.map(({ msg }) => msg)).toEqual([
        'dispatching request',
        'request completed',
        'dispatching request',
        'remote service returned an error status',
      ]);
      expect(records.every(({ component }) => component === 'dispatcher')).toBe(true);
    });
  });
});
