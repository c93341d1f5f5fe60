/**
 * Where an entity href points, relative to the configured MoySklad API base.
 *
 * - `customerorder`: `<apiUrl>/entity/customerorder/<id>`
 * - `other`: another resource under `<apiUrl>/`
 * - `foreign`: a different origin or path prefix, or not a URL at all;
 *   such hrefs are never requested with the MoySklad credential
 */
export type EntityHrefKind = "customerorder" | "other" | "foreign";

const CUSTOMER_ORDER_PATH = /^\/entity\/customerorder\/[^/]+$/;

function parseUrl(value: string): URL | undefined {
  try {
    return new URL(value);
  } catch {
    return undefined;
  }
}

export function classifyEntityHref(
  href: string,
  apiUrl: string,
): EntityHrefKind {
  const target = parseUrl(href);
  const base = parseUrl(apiUrl);
  if (!target || !base || target.origin !== base.origin) {
    return "foreign";
  }

  const basePath = base.pathname.replace(/\/+$/, "");
  if (!target.pathname.startsWith(`${basePath}/`)) {
    return "foreign";
  }

  return CUSTOMER_ORDER_PATH.test(target.pathname.slice(basePath.length))
    ? "customerorder"
    : "other";
}
