// apps/api/src/shared/identity.ts
import { getHeader, type GuardRequest } from "./permissions";
import { UNKNOWN_IDENTITY, type CallerIdentity } from "./types";

export const PRINCIPAL_HEADER = "x-ms-client-principal";

const USER_ID_CLAIMS = [
  "http://schemas.xmlsoap.org/ws/2005/05/identity/claims/nameidentifier",
  "nameidentifier",
  "sub"
];

const EMAIL_CLAIMS = [
  "http://schemas.xmlsoap.org/ws/2005/05/identity/claims/emailaddress",
  "emails",
  "email",
  "preferred_username",
  "upn"
];

const ROLE_CLAIMS = [
  "roles",
  "role",
  "http://schemas.microsoft.com/ws/2008/06/identity/claims/role"
];

type Claim = { typ: string; val: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function readClaims(principal: Record<string, unknown>): Claim[] {
  const raw = principal.claims;
  if (!Array.isArray(raw)) return [];

  const claims: Claim[] = [];
  for (const item of raw) {
    if (!isRecord(item)) continue;
    const typ = readString(item, "typ");
    const val = readString(item, "val");
    if (typ && val) claims.push({ typ, val });
  }
  return claims;
}

function findClaim(claims: Claim[], types: string[]): string | undefined {
  return claims.find((c) => types.includes(c.typ))?.val;
}

function uniqueRoles(values: string[]): string[] {
  const seen = new Set<string>();
  const roles: string[] = [];
  for (const value of values) {
    const role = value.trim();
    if (!role || seen.has(role.toLowerCase())) continue;
    seen.add(role.toLowerCase());
    roles.push(role);
  }
  return roles;
}

/**
 * Decodes the base64 JSON principal set by the hosting auth layer. Returns null
 * for anything that is not a readable principal object.
 */
export function decodeClientPrincipal(encoded: string): CallerIdentity | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, "base64").toString("utf8"));
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const claims = readClaims(parsed);
  const userId = readString(parsed, "userId") ?? findClaim(claims, USER_ID_CLAIMS);
  const email = readString(parsed, "userDetails") ?? findClaim(claims, EMAIL_CLAIMS);
  const roles = uniqueRoles(
    claims
      .filter((c) => ROLE_CLAIMS.some((t) => t.toLowerCase() === c.typ.toLowerCase()))
      .map((c) => c.val)
  );

  return {
    userId: userId ?? UNKNOWN_IDENTITY,
    email: email ?? UNKNOWN_IDENTITY,
    roles
  };
}

/**
 * Caller for a request: the client principal header when it decodes, otherwise
 * the x-user-id / x-user-email / x-user-roles headers used in local development.
 * Missing pieces become the UNKNOWN sentinel.
 */
export function resolveCaller(request: GuardRequest): CallerIdentity {
  const encoded = getHeader(request, PRINCIPAL_HEADER);
  if (encoded && encoded.trim()) {
    const principal = decodeClientPrincipal(encoded.trim());
    if (principal) return principal;
  }

  const userId = (getHeader(request, "x-user-id") ?? "").trim();
  const email = (getHeader(request, "x-user-email") ?? "").trim();
  const roles = uniqueRoles((getHeader(request, "x-user-roles") ?? "").split(","));

  return {
    userId: userId || UNKNOWN_IDENTITY,
    email: email || UNKNOWN_IDENTITY,
    roles
  };
}

/** Caller attached by the identity hook, resolved on the spot when absent. */
export function callerOf(request: GuardRequest & { caller?: CallerIdentity }): CallerIdentity {
  return request.caller ?? resolveCaller(request);
}
