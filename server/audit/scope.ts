import { isHtmlContentType, isHttpUrl, looksLikeHtml } from "./url-utils";

export type ScopeRejection = "protocol" | "cross-origin" | "non-html";

export type ScopeDecision = { inScope: true } | { inScope: false; reason: ScopeRejection };

/**
 * Decides whether a URL belongs to the audited site: same scheme, same host,
 * and (by extension, or by content type once known) an HTML document.
 */
export function checkScope(candidate: string, origin: string, contentType?: string): ScopeDecision {
  if (!isHttpUrl(candidate)) {
    return { inScope: false, reason: "protocol" };
  }

  let target: URL;
  let root: URL;
  try {
    target = new URL(candidate);
    root = new URL(origin);
  } catch {
    return { inScope: false, reason: "protocol" };
  }

  if (target.protocol !== root.protocol) {
    return { inScope: false, reason: "protocol" };
  }
  if (target.host !== root.host) {
    return { inScope: false, reason: "cross-origin" };
  }

  const isHtml = contentType === undefined ? looksLikeHtml(candidate) : isHtmlContentType(contentType);
  if (!isHtml) {
    return { inScope: false, reason: "non-html" };
  }

  return { inScope: true };
}
