/**
 * Parse raw cookie string into a key-value map.
 * @param raw raw cookie header string
 * @returns Record of cookie key-value pairs
 */
export function parseCookie(raw?: unknown): Record<string, string> {
  if (typeof raw !== 'string' || raw.length === 0) return {};
  const out: Record<string, string> = {};
  for (const part of raw.split(';')) {
    const [k, ...rest] = part.trim().split('=');
    if (!k) continue;
    try {
      out[k] = decodeURIComponent(rest.join('='));
    } catch {
      // keep undecodable values verbatim
      out[k] = rest.join('=');
    }
  }
  return out;
}

/**
 * Read one cookie from a request, whether or not cookie-parser ran:
 * prefers `req.cookies`, then falls back to the raw Cookie header.
 */
export function readCookie(req: unknown, name: string): string | null {
  if (!req || typeof req !== 'object') return null;

  if ('cookies' in req) {
    const jar: unknown = req.cookies;
    if (jar && typeof jar === 'object' && name in jar) {
      const v: unknown = Reflect.get(jar, name);
      if (typeof v === 'string' && v.length > 0) return v;
    }
  }

  if ('headers' in req) {
    const headers: unknown = req.headers;
    if (headers && typeof headers === 'object' && 'cookie' in headers) {
      const v = parseCookie(headers.cookie)[name];
      if (v !== undefined && v.length > 0) return v;
    }
  }
  return null;
}
