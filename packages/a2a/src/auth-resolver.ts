/**
 * Authentication resolver.
 *
 * Turns provider options into a frozen AuthConfig, and computes the
 * effective headers for a single agent URL. Everything here is pure.
 */

import { ProviderConfigError } from "@a2a-bridge/errors";
import type {
  A2aProviderOptions,
  AgentUrl,
  AuthConfig,
  AuthCredential,
  HeaderMap,
  ResolvedClientConfig,
} from "./types.js";
import { DEFAULT_TIMEOUT_SECONDS } from "./types.js";

/** Either shape of the `headers` option, or a (rejected) mix of both */
type HeadersOption = Readonly<Record<string, string | HeaderMap>>;

/**
 * Split the `headers` option into global defaults and per-URL overrides.
 *
 * All-string values form a flat global map; all-object values form a
 * per-URL map. Mixing the two is a configuration error.
 */
export function classifyHeaders(headers: HeadersOption | undefined): {
  readonly defaultHeaders: HeaderMap;
  readonly urlHeaders: ReadonlyMap<AgentUrl, HeaderMap>;
} {
  const defaultHeaders: Record<string, string> = {};
  const urlHeaders = new Map<AgentUrl, HeaderMap>();
  if (headers === undefined) {
    return { defaultHeaders, urlHeaders };
  }

  let sawFlat = false;
  let sawPerUrl = false;
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      sawFlat = true;
      defaultHeaders[key] = value;
    } else {
      sawPerUrl = true;
      urlHeaders.set(key, Object.freeze({ ...value }));
    }
  }

  if (sawFlat && sawPerUrl) {
    throw new ProviderConfigError(
      "headers must be either a flat header map or a map of agent URL to headers, not both",
    );
  }

  return { defaultHeaders: Object.freeze(defaultHeaders), urlHeaders };
}

/**
 * Build the process-wide AuthConfig from provider options.
 */
export function buildAuthConfig(options: A2aProviderOptions): AuthConfig {
  const { defaultHeaders, urlHeaders } = classifyHeaders(options.headers);
  const timeoutSeconds = options.timeout ?? DEFAULT_TIMEOUT_SECONDS;
  return Object.freeze({
    defaultHeaders,
    credential: options.auth,
    timeoutMs: Math.round(timeoutSeconds * 1000),
    urlHeaders,
  });
}

/**
 * Headers contributed by a credential.
 */
export function credentialHeaders(credential: AuthCredential | undefined): HeaderMap {
  if (credential === undefined) return {};
  switch (credential.type) {
    case "basic": {
      const encoded = Buffer.from(`${credential.username}:${credential.password}`).toString(
        "base64",
      );
      return { Authorization: `Basic ${encoded}` };
    }
    case "bearer":
      return { Authorization: `Bearer ${credential.token}` };
    case "apiKey":
      return { [credential.headerName ?? "X-API-Key"]: credential.key };
  }
}

/**
 * Compute the effective client settings for one URL.
 *
 * Merge order: global defaults, then the credential header, then the
 * override registered for this exact URL string. Later layers win.
 */
export function resolveClientConfig(url: AgentUrl, config: AuthConfig): ResolvedClientConfig {
  const override = config.urlHeaders.get(url) ?? {};
  return {
    url,
    headers: {
      ...config.defaultHeaders,
      ...credentialHeaders(config.credential),
      ...override,
    },
    credential: config.credential,
    timeoutMs: config.timeoutMs,
  };
}
