/**
 * Builds admin API endpoints from typed parts.
 *
 * Path segments are percent-encoded one by one and the query goes through
 * URLSearchParams, so ids and filter values never leak into the path syntax.
 * Ghost endpoints always carry a trailing slash before the query.
 */

export type QueryValue = string | number | boolean | null | undefined;

export interface EndpointParts {
  path: string[];
  query?: Record<string, QueryValue>;
}

export function buildEndpoint(parts: EndpointParts): string {
  const path = parts.path.map((segment) => encodeURIComponent(segment)).join('/');

  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(parts.query ?? {})) {
    if (value === null || value === undefined) {
      continue;
    }
    params.append(key, String(value));
  }

  const query = params.toString();
  return query ? `${path}/?${query}` : `${path}/`;
}

/**
 * posts/?source=html[&limit=N][&filter=status:S]
 */
export function postsCollectionEndpoint(options: { limit?: number; status?: string } = {}): string {
  return buildEndpoint({
    path: ['posts'],
    query: {
      source: 'html',
      limit: options.limit,
      filter: options.status && options.status !== 'all' ? `status:${options.status}` : undefined,
    },
  });
}

/**
 * posts/{id}/?source=html
 */
export function postEndpoint(postId: string): string {
  return buildEndpoint({ path: ['posts', postId], query: { source: 'html' } });
}

export function siteEndpoint(): string {
  return buildEndpoint({ path: ['site'] });
}
