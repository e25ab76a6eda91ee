/**
 * Picks the Access-Control-Allow-Origin value for a request, or `null` when
 * the origin is not allowed.
 */
export function resolveAllowedOrigin(allowedOrigins: string[], requestOrigin: string | undefined): string | null {
  if (allowedOrigins.includes("*")) return "*";
  if (requestOrigin && allowedOrigins.includes(requestOrigin)) return requestOrigin;
  return null;
}

export function corsHeaders(allowedOrigins: string[], requestOrigin: string | undefined): Record<string, string> {
  const origin = resolveAllowedOrigin(allowedOrigins, requestOrigin);
  if (origin === null) return {};

  const headers: Record<string, string> = {
    "Access-Control-Allow-Origin": origin,
    "Access-Control-Allow-Methods": "GET, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
  };
  if (origin !== "*") {
    headers["Vary"] = "Origin";
  }
  return headers;
}
