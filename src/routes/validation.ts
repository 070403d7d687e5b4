import { HTTPException } from 'hono/http-exception';

export function badRequest(message: string): HTTPException {
  return new HTTPException(400, { message });
}

/**
 * Require an absolute http(s) URL for the archive location
 */
export function requireArchiveUrl(value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw badRequest('Missing url parameter');
  }

  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    throw badRequest(`Invalid url: ${value}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw badRequest(`Unsupported url protocol: ${url.protocol}`);
  }
  return url.toString();
}

export function requireString(name: string, value: unknown): string {
  if (typeof value !== 'string' || value === '') {
    throw badRequest(`Missing ${name} parameter`);
  }
  return value;
}
