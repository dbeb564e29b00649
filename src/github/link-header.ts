/**
 * Parse an RFC 8288 `Link` header as GitHub sends it for pagination:
 *
 *   <https://api.github.com/orgs/x/repos?page=2>; rel="next", <...?page=5>; rel="last"
 *
 * Returns a map of relation → URL. Malformed segments are skipped.
 */
export function parseLinkHeader(header: string | null | undefined): Record<string, string> {
  const links: Record<string, string> = {};
  if (!header) return links;

  for (const segment of splitSegments(header)) {
    const m = /^\s*<([^>]*)>\s*((?:;[^;]*)*)$/.exec(segment);
    if (!m) continue;
    const url = m[1].trim();
    if (!url) continue;

    for (const param of m[2].split(';')) {
      const pm = /^\s*rel\s*=\s*"?([^"]*)"?\s*$/i.exec(param);
      if (!pm) continue;
      for (const rel of pm[1].split(/\s+/).filter(Boolean)) {
        links[rel.toLowerCase()] = url;
      }
    }
  }
  return links;
}

export function nextPageUrl(header: string | null | undefined): string | null {
  return parseLinkHeader(header).next ?? null;
}

// URLs may contain commas, so only split on commas outside <...>.
function splitSegments(header: string): string[] {
  const out: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < header.length; i++) {
    const ch = header[i];
    if (ch === '<') depth++;
    else if (ch === '>') depth = Math.max(0, depth - 1);
    else if (ch === ',' && depth === 0) {
      out.push(header.slice(start, i));
      start = i + 1;
    }
  }
  out.push(header.slice(start));
  return out.filter((s) => s.trim().length > 0);
}
