/**
 * Path prefix handling for reverse-proxied deployments
 */

/**
 * "" or a path starting with "/" and without a trailing slash
 */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/\/+$/, '');
  if (trimmed === '') {
    return '';
  }
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Strip `prefix` when the path starts with it; other paths route unchanged
 */
export function stripPrefix(path: string, prefix: string): string {
  if (!prefix) {
    return path;
  }
  if (path === prefix) {
    return '/';
  }
  if (path.startsWith(`${prefix}/`)) {
    return path.slice(prefix.length);
  }
  return path;
}

export function pathnameOf(request: Request): string {
  return new URL(request.url).pathname;
}

/**
 * hono `getPath` that routes with the prefix removed. A trailing slash
 * routes like the bare path.
 */
export function createPrefixedGetPath(prefix: string): (request: Request) => string {
  return (request) => {
    const path = stripPrefix(pathnameOf(request), prefix);
    return path.length > 1 ? path.replace(/\/+$/, '') || '/' : path;
  };
}
