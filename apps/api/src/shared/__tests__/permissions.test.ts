import { describe, it, expect, vi } from "vitest";
import type {
  Membership,
  MembershipScanOptions,
  MembershipStore
} from "../../modules/memberships/memberships.schemas";
import { isHttpError } from "../errors";
import {
  createApiGuards,
  getQueryParam,
  requireLeagueId,
  resolveLeagueScope,
  type GuardRequest
} from "../permissions";
import type { StoreCallOptions } from "../types";

class InMemoryMembershipStore implements MembershipStore {
  readonly pagesRead: number[] = [];
  constructor(private readonly rows: Membership[]) {}

  async get(userId: string, leagueId: string, options?: StoreCallOptions) {
    options?.signal?.throwIfAborted();
    return this.rows.find((m) => m.userId === userId && m.leagueId === leagueId) ?? null;
  }

  async *listByUser(userId: string, options: MembershipScanOptions = {}) {
    const mine = this.rows.filter((m) => m.userId === userId);
    const pageSize = options.pageSize ?? 100;
    for (let offset = 0; offset < mine.length; offset += pageSize) {
      options.signal?.throwIfAborted();
      this.pagesRead.push(offset);
      yield* mine.slice(offset, offset + pageSize);
    }
  }
}

function membership(userId: string, leagueId: string, role: string): Membership {
  return { userId, leagueId, role, updatedAt: "2026-01-01T00:00:00.000Z" };
}

function request(url: string, headers: GuardRequest["headers"] = {}): GuardRequest {
  return { url, headers };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to reject");
}

describe("getQueryParam", () => {
  it("matches keys case-insensitively and decodes values", () => {
    expect(getQueryParam(request("/slots?LeagueID=North%20Side&x=1"), "leagueId")).toBe("North Side");
  });

  it("returns the first match and skips parts without '='", () => {
    expect(getQueryParam(request("/slots?leagueId&leagueId=a&leagueId=b"), "leagueId")).toBe("a");
  });

  it("returns '' when there is no query or no match", () => {
    expect(getQueryParam(request("/slots"), "leagueId")).toBe("");
    expect(getQueryParam(request("/slots?"), "leagueId")).toBe("");
    expect(getQueryParam(request("/slots?division=U10"), "leagueId")).toBe("");
  });

  it("keeps malformed escapes as sent", () => {
    expect(getQueryParam(request("/slots?leagueId=%E0%A4%A"), "leagueId")).toBe("%E0%A4%A");
  });
});

describe("league scope", () => {
  it("uses the header when both channels agree", () => {
    expect(resolveLeagueScope("Spring", "spring")).toBe("Spring");
  });

  it("falls back to the query", () => {
    expect(requireLeagueId(request("/fields?leagueId=spring"))).toBe("spring");
  });

  it("reads the header case-insensitively", () => {
    expect(requireLeagueId(request("/fields", { "X-League-Id": " fall " }))).toBe("fall");
  });

  it("rejects a mismatch between header and query", () => {
    const err = (() => {
      try {
        requireLeagueId(request("/fields?leagueId=fall", { "x-league-id": "spring" }));
      } catch (e) {
        return e;
      }
    })();
    expect(isHttpError(err, "InvalidScope")).toBe(true);
    expect(isHttpError(err) && err.message).toBe(
      "leagueId mismatch between header x-league-id and query ?leagueId=."
    );
  });

  it("rejects a request with no league id", () => {
    expect(() => requireLeagueId(request("/fields", { "x-league-id": "  " }))).toThrow(
      "Missing leagueId. Send x-league-id header (preferred) or ?leagueId=."
    );
  });
});

describe("membership guards", () => {
  const store = new InMemoryMembershipStore([
    membership("u-admin", "spring", "LeagueAdmin"),
    membership("u-coach", "spring", "Coach"),
    membership("u-viewer", "spring", "Viewer"),
    membership("u-blank", "spring", " "),
    membership("u-super", "fall", "admin")
  ]);
  const guards = createApiGuards({ store, requireAdminRole: false });

  it("never treats the UNKNOWN caller as a member", async () => {
    const spy = vi.spyOn(store, "get");
    expect(await guards.isMember("UNKNOWN", "spring")).toBe(false);
    expect(await guards.isMember("", "spring")).toBe(false);
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });

  it("answers membership from the store", async () => {
    expect(await guards.isMember("u-coach", "spring")).toBe(true);
    expect(await guards.isMember("u-coach", "fall")).toBe(false);
  });

  it("returns the trimmed role or ''", async () => {
    expect(await guards.getRole("u-coach", "spring")).toBe("Coach");
    expect(await guards.getRole("u-coach", "fall")).toBe("");
  });

  it("requireMember distinguishes unauthenticated from forbidden", async () => {
    const unauthenticated = await rejection(guards.requireMember("UNKNOWN", "spring"));
    expect(isHttpError(unauthenticated, "Unauthorized")).toBe(true);

    const forbidden = await rejection(guards.requireMember("u-coach", "fall"));
    expect(isHttpError(forbidden, "Forbidden")).toBe(true);

    await expect(guards.requireMember("u-viewer", "spring")).resolves.toBeUndefined();
  });

  it("requireLeagueAdmin accepts LeagueAdmin and Admin roles only", async () => {
    await expect(guards.requireLeagueAdmin("u-admin", "spring")).resolves.toBe("LeagueAdmin");
    await expect(guards.requireLeagueAdmin("u-super", "fall")).resolves.toBe("admin");
    await expect(guards.requireLeagueAdmin("u-coach", "spring")).rejects.toThrow(
      "League admin role required."
    );
  });

  it("requireNotViewer blocks viewers and blank roles", async () => {
    await expect(guards.requireNotViewer("u-coach", "spring")).resolves.toBe("Coach");
    await expect(guards.requireNotViewer("u-viewer", "spring")).rejects.toThrow(
      "Viewers cannot change league data."
    );
    await expect(guards.requireNotViewer("u-blank", "spring")).rejects.toThrow(
      "Viewers cannot change league data."
    );
  });

  it("lets store failures through", async () => {
    const failing: MembershipStore = {
      get: async () => {
        throw new Error("store offline");
      },
      listByUser: store.listByUser.bind(store)
    };
    const g = createApiGuards({ store: failing, requireAdminRole: false });
    await expect(g.isMember("u-coach", "spring")).rejects.toThrow("store offline");
  });

  it("stops when the request signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const err = await rejection(
      guards.requireMember("u-coach", "spring", { signal: controller.signal })
    );
    expect(err instanceof Error && err.name).toBe("AbortError");
  });
});

describe("requireAdmin", () => {
  it("with the toggle off, any membership is enough", async () => {
    const store = new InMemoryMembershipStore([membership("u1", "spring", "Viewer")]);
    const guards = createApiGuards({ store, requireAdminRole: false });
    await expect(guards.requireAdmin("u1")).resolves.toBeUndefined();
  });

  it("with the toggle on, needs an Admin role in some league", async () => {
    const store = new InMemoryMembershipStore([
      membership("u1", "a", "Coach"),
      membership("u1", "b", " ADMIN "),
      membership("u2", "a", "Coach")
    ]);
    const guards = createApiGuards({ store, requireAdminRole: true });
    await expect(guards.requireAdmin("u1")).resolves.toBeUndefined();

    const err = await rejection(guards.requireAdmin("u2"));
    expect(isHttpError(err, "AdminRequired")).toBe(true);
    expect(isHttpError(err) && err.statusCode).toBe(403);
  });

  it("answers Forbidden when the caller has no memberships at all", async () => {
    const guards = createApiGuards({
      store: new InMemoryMembershipStore([]),
      requireAdminRole: true
    });
    const err = await rejection(guards.requireAdmin("nobody"));
    expect(isHttpError(err, "Forbidden")).toBe(true);
  });

  it("rejects the UNKNOWN caller before touching the store", async () => {
    const store = new InMemoryMembershipStore([membership("UNKNOWN", "a", "Admin")]);
    const guards = createApiGuards({ store, requireAdminRole: true });
    const err = await rejection(guards.requireAdmin("unknown"));
    expect(isHttpError(err, "Unauthorized")).toBe(true);
    expect(store.pagesRead).toEqual([]);
  });

  it("stops scanning at the first qualifying page", async () => {
    const rows = [membership("u1", "x0", "Admin")];
    for (let i = 1; i < 250; i++) rows.push(membership("u1", `x${i}`, "Coach"));
    const store = new InMemoryMembershipStore(rows);
    const guards = createApiGuards({ store, requireAdminRole: true });

    await guards.requireAdmin("u1");
    expect(store.pagesRead).toEqual([0]);
  });

  it("reads every page when no row qualifies", async () => {
    const rows: Membership[] = [];
    for (let i = 0; i < 250; i++) rows.push(membership("u1", `x${i}`, "Coach"));
    const store = new InMemoryMembershipStore(rows);
    const guards = createApiGuards({ store, requireAdminRole: true });

    await expect(guards.requireAdmin("u1")).rejects.toThrow("Admin role required.");
    expect(store.pagesRead).toEqual([0, 100, 200]);
  });
});
