import { PaginationStyle } from "../types";

const TRACKING_PARAM_PATTERN = /^(utm_|fbclid$|gclid$|mc_cid$|mc_eid$|spm$)/i;

export function normalizeUrl(input: string, base?: string): string | null {
  let parsed: URL;

  try {
    parsed = base ? new URL(input, base) : new URL(input);
  } catch {
    return null;
  }

  if (!(parsed.protocol === "http:" || parsed.protocol === "https:")) {
    return null;
  }

  parsed.hash = "";
  parsed.hostname = parsed.hostname.toLowerCase();

  if ((parsed.protocol === "http:" && parsed.port === "80") || (parsed.protocol === "https:" && parsed.port === "443")) {
    parsed.port = "";
  }

  const keptParams: Array<[string, string]> = [];
  for (const [key, value] of parsed.searchParams.entries()) {
    if (!TRACKING_PARAM_PATTERN.test(key)) {
      keptParams.push([key, value]);
    }
  }

  keptParams.sort(([aKey, aValue], [bKey, bValue]) => {
    if (aKey === bKey) {
      return aValue.localeCompare(bValue);
    }
    return aKey.localeCompare(bKey);
  });

  parsed.search = "";
  for (const [key, value] of keptParams) {
    parsed.searchParams.append(key, value);
  }

  let pathname = parsed.pathname.replace(/\/+/g, "/");
  if (pathname !== "/") {
    pathname = pathname.replace(/\/+$/, "");
  }
  parsed.pathname = pathname;

  return parsed.toString();
}

/** Resolves an href or src found inside a card; protocol-relative and relative links included. */
export function resolveListingUrl(raw: string | undefined, pageUrl: string): string | undefined {
  const trimmed = raw?.trim();
  if (!trimmed || trimmed.startsWith("javascript:") || trimmed.startsWith("data:")) {
    return undefined;
  }
  return normalizeUrl(trimmed, pageUrl) ?? undefined;
}

/** Page 1 is always the configured search URL itself. */
export function paginationUrl(searchUrl: string, page: number, style: PaginationStyle): string {
  if (page <= 1) {
    return searchUrl;
  }

  if (style === "path_segment") {
    if (/\/page\/\d+/.test(searchUrl)) {
      return searchUrl.replace(/\/page\/\d+/, `/page/${page}`);
    }
    const [path, query] = splitQuery(searchUrl);
    return `${path.replace(/\/+$/, "")}/page/${page}${query}`;
  }

  const param = style === "p_param" ? "p" : "page";
  const existing = new RegExp(`([?&])${param}=\\d+`);
  if (existing.test(searchUrl)) {
    return searchUrl.replace(existing, `$1${param}=${page}`);
  }
  return `${searchUrl}${searchUrl.includes("?") ? "&" : "?"}${param}=${page}`;
}

function splitQuery(url: string): [string, string] {
  const index = url.indexOf("?");
  return index === -1 ? [url, ""] : [url.slice(0, index), url.slice(index)];
}

export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{([a-z_]+)\}/g, (match, key: string) => {
    const value = values[key];
    return value === undefined ? match : encodeURIComponent(value);
  });
}
