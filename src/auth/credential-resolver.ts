import { CREDENTIAL_HEADER } from '../constants.js';

/**
 * Credential a lakehouse client is built with. Exactly one source is active
 * per tool call; `default` defers to the host machine's default profile.
 */
export type ClientConfig =
  | { source: 'default' }
  | { source: 'profile'; profile: string }
  | { source: 'api_key'; apiKey: string };

/** Header map as delivered by the MCP HTTP transports. */
export type RequestHeaders = Record<string, string | string[] | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolves the credential for one tool call.
 *
 * A non-empty header value always wins over the server profile; with neither,
 * the host default applies. Never throws: a missing credential surfaces later
 * as the lakehouse's own authentication error.
 */
export function resolveClientConfig(serverProfile?: string, callHeaderValue?: string): ClientConfig {
  const apiKey = nonEmpty(callHeaderValue);
  if (apiKey) {
    return { source: 'api_key', apiKey };
  }

  const profile = nonEmpty(serverProfile);
  if (profile) {
    return { source: 'profile', profile };
  }

  return { source: 'default' };
}

function stripBearer(value: string): string {
  return value.trim().replace(/^bearer(?:\s+|$)/i, '');
}

/**
 * Reads the credential header from a request, if any. Matching is
 * case-insensitive and a `Bearer ` prefix is dropped.
 */
export function readCredentialHeader(headers: RequestHeaders | undefined): string | undefined {
  if (!headers) {
    return undefined;
  }

  const wanted = CREDENTIAL_HEADER.toLowerCase();
  for (const [name, raw] of Object.entries(headers)) {
    if (name.toLowerCase() !== wanted || raw === undefined) {
      continue;
    }
    const values = Array.isArray(raw) ? raw : [raw];
    for (const value of values) {
      const key = nonEmpty(stripBearer(value));
      if (key) {
        return key;
      }
    }
  }

  return undefined;
}

/** Safe-to-log description of a resolved config. */
export function describeClientConfig(config: ClientConfig): string {
  switch (config.source) {
    case 'api_key':
      return 'api key from request header';
    case 'profile':
      return `profile '${config.profile}'`;
    case 'default':
      return 'host default profile';
  }
}
