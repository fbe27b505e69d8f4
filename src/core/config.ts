import { type Logger, pino } from 'pino';
import { ConfigError } from '../error/configError.js';
import { FetchClient } from '../fetch/client.js';
import type {
  ClientConfig,
  FetchClientProvider,
  FetchImplementation,
  UserAgentOptions,
} from '../types/request.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Production endpoint of the v2 API. */
export const DEFAULT_BASE_URL = 'https://api.modrinth.com/v2/';

/** Identification used when the caller does not name its application. */
export const DEFAULT_USER_AGENT: UserAgentOptions = {
  name: 'modrinth-typed',
  version: '0.3.0',
};

/** Configuration accepted by {@link createClientConfig} and `ModrinthClient.create`. */
export interface ClientConfigProps {
  /**
   * Endpoint every path is resolved below.
   * @default 'https://api.modrinth.com/v2/'
   */
  baseUrl?: string;
  /** Identification of the consuming application. */
  userAgent?: UserAgentOptions;
  /** Personal access token, sent as-is in the `Authorization` header. */
  token?: string;
  /** Transport class. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** `fetch` replacement handed to the transport. */
  fetch?: FetchImplementation;
  /** Logger for dispatch records, silent unless given. */
  logger?: Logger;
}

/**
 * Renders `name/version (contact)`, leaving out the parts that are not set.
 */
export function formatUserAgent({ name, version, contact }: UserAgentOptions): string {
  let userAgent = name.trim();
  if (version) {
    userAgent += `/${version}`;
  }

  if (contact) {
    userAgent += ` (${contact})`;
  }

  return userAgent;
}

/** Headers would reject the value at request time, so check it up front. */
function isHeaderValue(value: string): boolean {
  const [err] = safeWrap(() => new Headers({ 'X-Check': value }));
  return err === null;
}

function normalizeBaseUrl(baseUrl: string): SafeWrap<ConfigError, string> {
  const [errUrl, url] = safeWrap(() => new URL(baseUrl));
  if (errUrl) {
    return [new ConfigError(`error parsing base url ${JSON.stringify(baseUrl)}`, 'baseUrl', { cause: errUrl }), null];
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return [new ConfigError(`error base url must use http(s), got ${url.protocol}`, 'baseUrl'), null];
  }

  url.search = '';
  url.hash = '';
  if (!url.pathname.endsWith('/')) {
    url.pathname += '/';
  }

  return [null, url.href];
}

/**
 * Validates client properties once and freezes them into the configuration
 * every call of a client reads.
 */
export function createClientConfig(props: ClientConfigProps = {}): SafeWrap<ConfigError, ClientConfig> {
  const [errBaseUrl, baseUrl] = normalizeBaseUrl(props.baseUrl ?? DEFAULT_BASE_URL);
  if (errBaseUrl) {
    return [errBaseUrl, null];
  }

  const agent = props.userAgent ?? DEFAULT_USER_AGENT;
  if (!agent.name.trim()) {
    return [new ConfigError('error user agent requires an application name', 'userAgent'), null];
  }

  const userAgent = formatUserAgent(agent);
  if (!isHeaderValue(userAgent)) {
    return [new ConfigError(`error user agent ${JSON.stringify(userAgent)} is not a valid header value`, 'userAgent'), null];
  }

  const token = props.token ? props.token : null;
  if (token !== null && !isHeaderValue(token)) {
    return [new ConfigError('error token is not a valid header value', 'token'), null];
  }

  return [
    null,
    Object.freeze({
      baseUrl,
      userAgent,
      token,
      fetchProvider: props.fetchProvider ?? FetchClient,
      fetch: props.fetch ?? null,
      logger: props.logger ?? pino({ name: DEFAULT_USER_AGENT.name, level: 'silent' }),
    }),
  ];
}
