import type { Request } from 'express';

/**
 * Absolute base for links, ending in `/`: `<proto>://<host>/<prefix>/`.
 *
 * `setGlobalPrefix` does not populate `request.baseUrl`, so the prefix is
 * taken from configuration. Forwarded proto/host headers win over the socket
 * values when the app sits behind a proxy.
 */
export function buildBaseUrl(request: Request, apiPrefix: string): string {
  const protocol = firstHeaderValue(request.headers['x-forwarded-proto']) ?? request.protocol;
  const host = firstHeaderValue(request.headers['x-forwarded-host']) ?? request.get('host');
  const prefix = apiPrefix.replace(/^\/+|\/+$/g, '');

  return prefix ? `${protocol}://${host}/${prefix}/` : `${protocol}://${host}/`;
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  const first = raw?.split(',')[0]?.trim();
  return first ? first : undefined;
}
