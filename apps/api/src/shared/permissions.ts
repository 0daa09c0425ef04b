// apps/api/src/shared/permissions.ts
import type { FastifyReply } from "fastify";
import { createHttpError } from "./errors";
import { UNKNOWN_IDENTITY, type StoreCallOptions } from "./types";
import {
  ADMIN_ROLE,
  LEAGUE_ROLES,
  type MembershipStore
} from "../modules/memberships/memberships.schemas";

export const LEAGUE_HEADER_NAME = "x-league-id";
export const LEAGUE_QUERY_PARAM = "leagueId";

const ADMIN_SCAN_PAGE_SIZE = 100;

/**
 * What the guards need from a request: headers and the raw URL. Fastify's request
 * satisfies this, and so does a plain object in tests.
 */
export type GuardRequest = {
  headers: Record<string, string | string[] | undefined>;
  url: string;
};

export type ApiGuardsOptions = {
  store: MembershipStore;
  /** REQUIRE_ADMIN_ROLE, fixed when the guards are built. */
  requireAdminRole: boolean;
};

export type ApiGuards = ReturnType<typeof createApiGuards>;

export function isUnknownCaller(userId: string | null | undefined): boolean {
  const id = (userId ?? "").trim();
  return id.length === 0 || id.toLowerCase() === UNKNOWN_IDENTITY.toLowerCase();
}

function sameText(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function safeDecode(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    // Malformed escapes stay as they were sent.
    return raw;
  }
}

export function getHeader(request: GuardRequest, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(request.headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) continue;
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

/**
 * Case-insensitive query lookup on the raw query string. Keys and values are
 * URL-decoded; the first match wins; "" when the key is absent.
 */
export function getQueryParam(request: GuardRequest, key: string): string {
  const q = request.url.includes("?")
    ? request.url.slice(request.url.indexOf("?") + 1)
    : "";
  if (!q.trim()) return "";

  for (const part of q.split("&")) {
    if (!part) continue;
    const eq = part.indexOf("=");
    if (eq === -1) continue;

    const k = safeDecode(part.slice(0, eq));
    if (!sameText(k, key)) continue;
    return safeDecode(part.slice(eq + 1));
  }

  return "";
}

/**
 * Reconciles the two league-id channels: both set and different is an error,
 * otherwise the header wins and the query is the fallback.
 */
export function resolveLeagueScope(
  headerValue: string | undefined,
  queryValue: string | undefined
): string {
  const header = (headerValue ?? "").trim();
  const query = (queryValue ?? "").trim();

  if (header && query && !sameText(header, query)) {
    throw createHttpError(
      400,
      `leagueId mismatch between header ${LEAGUE_HEADER_NAME} and query ?${LEAGUE_QUERY_PARAM}=.`,
      "InvalidScope",
      { header, query }
    );
  }

  const leagueId = header || query;
  if (!leagueId) {
    throw createHttpError(
      400,
      `Missing leagueId. Send ${LEAGUE_HEADER_NAME} header (preferred) or ?${LEAGUE_QUERY_PARAM}=.`,
      "InvalidScope"
    );
  }

  return leagueId;
}

export function requireLeagueId(request: GuardRequest): string {
  return resolveLeagueScope(
    getHeader(request, LEAGUE_HEADER_NAME),
    getQueryParam(request, LEAGUE_QUERY_PARAM)
  );
}

function assertAuthenticated(userId: string | null | undefined): string {
  if (isUnknownCaller(userId)) {
    throw createHttpError(401, "Not authenticated.", "Unauthorized");
  }
  return (userId ?? "").trim();
}

/**
 * ---------------------------------------------------------------------------
 * Membership gates. All reads go through the MembershipStore; a missing row is
 * "no access", any other store failure propagates to the route.
 * ---------------------------------------------------------------------------
 */
export function createApiGuards({ store, requireAdminRole }: ApiGuardsOptions) {
  async function getMembership(
    userId: string | null | undefined,
    leagueId: string,
    options?: StoreCallOptions
  ) {
    const user = (userId ?? "").trim();
    const league = leagueId.trim();
    if (isUnknownCaller(user) || !league) return null;
    return store.get(user, league, options);
  }

  async function isMember(
    userId: string | null | undefined,
    leagueId: string,
    options?: StoreCallOptions
  ): Promise<boolean> {
    return (await getMembership(userId, leagueId, options)) !== null;
  }

  async function requireMember(
    userId: string | null | undefined,
    leagueId: string,
    options?: StoreCallOptions
  ): Promise<void> {
    assertAuthenticated(userId);
    if (!(await isMember(userId, leagueId, options))) {
      throw createHttpError(403, "Forbidden", "Forbidden", { leagueId });
    }
  }

  async function getRole(
    userId: string | null | undefined,
    leagueId: string,
    options?: StoreCallOptions
  ): Promise<string> {
    const membership = await getMembership(userId, leagueId, options);
    return membership ? membership.role.trim() : "";
  }

  /**
   * Admin bootstrap gate. Toggle off: any membership row in any league. Toggle
   * on: a row whose role is "Admin". Stops reading at the first qualifying row.
   */
  async function requireAdmin(
    userId: string | null | undefined,
    options: StoreCallOptions = {}
  ): Promise<void> {
    const user = assertAuthenticated(userId);

    let hasAny = false;
    for await (const membership of store.listByUser(user, {
      pageSize: ADMIN_SCAN_PAGE_SIZE,
      signal: options.signal
    })) {
      hasAny = true;
      if (!requireAdminRole) return;
      if (sameText(membership.role.trim(), ADMIN_ROLE)) return;
    }

    if (!hasAny) {
      throw createHttpError(403, "Forbidden", "Forbidden");
    }
    throw createHttpError(403, "Admin role required.", "AdminRequired");
  }

  async function requireLeagueAdmin(
    userId: string | null | undefined,
    leagueId: string,
    options?: StoreCallOptions
  ): Promise<string> {
    assertAuthenticated(userId);
    const membership = await getMembership(userId, leagueId, options);
    if (!membership) {
      throw createHttpError(403, "Forbidden", "Forbidden", { leagueId });
    }
    const role = membership.role.trim();
    if (!sameText(role, LEAGUE_ROLES.LeagueAdmin) && !sameText(role, ADMIN_ROLE)) {
      throw createHttpError(403, "League admin role required.", "Forbidden", {
        leagueId,
        actual: role
      });
    }
    return role;
  }

  async function requireNotViewer(
    userId: string | null | undefined,
    leagueId: string,
    options?: StoreCallOptions
  ): Promise<string> {
    assertAuthenticated(userId);
    const membership = await getMembership(userId, leagueId, options);
    if (!membership) {
      throw createHttpError(403, "Forbidden", "Forbidden", { leagueId });
    }
    const role = membership.role.trim();
    if (!role || sameText(role, LEAGUE_ROLES.Viewer)) {
      throw createHttpError(403, "Viewers cannot change league data.", "Forbidden", {
        leagueId
      });
    }
    return role;
  }

  return {
    requireLeagueId,
    getQueryParam,
    isMember,
    requireMember,
    getRole,
    requireAdmin,
    requireLeagueAdmin,
    requireNotViewer
  };
}

/**
 * Signal that fires when the client goes away before the reply is sent, so store
 * calls can stop early.
 */
export function requestSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}
