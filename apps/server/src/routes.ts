import type { QueryService } from "@ontoscope/core";
import { decodeTermId } from "@ontoscope/core";

export interface RouteResult {
  status: number;
  body: unknown;
}

type Handler = (service: QueryService, params: RouteParams) => RouteResult;

interface RouteParams {
  id: string;
  query: URLSearchParams;
}

interface Route {
  pattern: RegExp;
  handler: Handler;
}

const ok = (body: unknown): RouteResult => ({ status: 200, body });
const notFound = (detail: string): RouteResult => ({ status: 404, body: { detail } });

function orNotFound(id: string, body: unknown): RouteResult {
  return body === null ? notFound(`Node not found: ${decodeTermId(id)}`) : ok(body);
}

// Matched against the raw path, so an encoded "/" inside an id never splits it.
// Order matters: the /parents and /children forms must win over the bare node route.
const ROUTES: Route[] = [
  { pattern: /^\/health$/, handler: (service) => ok(service.getHealth()) },
  { pattern: /^\/api\/stats$/, handler: (service) => ok(service.getStats()) },
  {
    pattern: /^\/api\/search$/,
    handler: (service, { query }) => {
      const q = query.get("q");
      if (q === null) {
        return { status: 422, body: { detail: "Query parameter 'q' is required" } };
      }
      return ok(
        service.search({
          q,
          page: query.get("page"),
          pageSize: query.get("pageSize") ?? query.get("page_size"),
        }),
      );
    },
  },
  {
    pattern: /^\/api\/subgraph\/(.+)$/,
    handler: (service, { id, query }) => orNotFound(id, service.getSubgraph(id, query.get("depth"))),
  },
  {
    pattern: /^\/api\/node\/(.+)\/parents$/,
    handler: (service, { id }) => orNotFound(id, service.getParents(id)),
  },
  {
    pattern: /^\/api\/node\/(.+)\/children$/,
    handler: (service, { id }) => orNotFound(id, service.getChildren(id)),
  },
  {
    pattern: /^\/api\/node\/(.+)$/,
    handler: (service, { id }) => orNotFound(id, service.getTerm(id)),
  },
];

export function isApiPath(pathname: string): boolean {
  return pathname === "/health" || pathname === "/api" || pathname.startsWith("/api/");
}

/**
 * Maps one API request onto the query service. Returns `null` for paths
 * outside the API so the caller can fall through to static files.
 */
export function routeApiRequest(service: QueryService, method: string, url: URL): RouteResult | null {
  if (!isApiPath(url.pathname)) return null;

  if (method !== "GET" && method !== "HEAD") {
    return { status: 405, body: { detail: "Method not allowed" } };
  }

  for (const { pattern, handler } of ROUTES) {
    const match = pattern.exec(url.pathname);
    if (match) {
      return handler(service, { id: match[1] ?? "", query: url.searchParams });
    }
  }

  return notFound("Not found");
}
