import { InvalidStateError } from "../errors";

import type { SourceCredentials, SourceKind } from "../types";

/**
 * Guesses the hosting product from a URL. Anything that is not one of the
 * public hosts is treated as a custom server.
 */
export function detectSourceKind(sourceUrl: string | undefined): SourceKind {
  if (!sourceUrl) {
    return "none";
  }

  const host = parseHttpUrl(sourceUrl)?.hostname ?? sourceUrl.match(/^[\w.-]+@([^:]+):/)?.[1];
  if (host === "github.com") return "github";
  if (host === "gitlab.com") return "gitlab";
  if (host === "gitea.com") return "gitea";
  return "custom";
}

function parseHttpUrl(value: string): URL | null {
  if (!/^https?:\/\//i.test(value)) {
    return null;
  }
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

function withUserInfo(sourceUrl: string, username: string, password?: string): string {
  const url = parseHttpUrl(sourceUrl);
  if (!url) {
    // ssh and file remotes authenticate outside the URL
    return sourceUrl;
  }
  url.username = encodeURIComponent(username);
  url.password = password ? encodeURIComponent(password) : "";
  return url.toString();
}

type CloneUrlStrategy = (sourceUrl: string, credentials?: SourceCredentials) => string;

/**
 * Clone URL construction per source kind. Hosts differ only in how a token
 * is presented over HTTPS.
 */
export const SOURCE_STRATEGIES: Record<SourceKind, CloneUrlStrategy> = {
  github: (sourceUrl, credentials) =>
    credentials ? withUserInfo(sourceUrl, credentials.username ?? "x-access-token", credentials.token) : sourceUrl,
  gitlab: (sourceUrl, credentials) =>
    credentials ? withUserInfo(sourceUrl, credentials.username ?? "oauth2", credentials.token) : sourceUrl,
  gitea: (sourceUrl, credentials) => {
    if (!credentials) return sourceUrl;
    return credentials.username
      ? withUserInfo(sourceUrl, credentials.username, credentials.token)
      : withUserInfo(sourceUrl, credentials.token);
  },
  custom: (sourceUrl, credentials) =>
    credentials ? withUserInfo(sourceUrl, credentials.username ?? "git", credentials.token) : sourceUrl,
  none: () => {
    throw new InvalidStateError("Repository has no source to clone from");
  },
};

export function buildCloneUrl(kind: SourceKind, sourceUrl: string, credentials?: SourceCredentials): string {
  return SOURCE_STRATEGIES[kind](sourceUrl, credentials);
}

/**
 * Hides credentials embedded in a URL so it can be logged or stored.
 */
export function redactUrl(value: string): string {
  return value.replace(/(\b[a-z][a-z0-9+.-]*:\/\/)[^/@\s]+@/gi, "$1***@");
}
