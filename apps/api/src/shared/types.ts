// apps/api/src/shared/types.ts

/** Identity value meaning "no authenticated caller". */
export const UNKNOWN_IDENTITY = "UNKNOWN";

export interface CallerIdentity {
  userId: string;
  email: string;
  roles: readonly string[];
}

export interface StoreCallOptions {
  signal?: AbortSignal;
}

// Fastify request augmentation
declare module "fastify" {
  interface FastifyRequest {
    caller?: CallerIdentity;
  }
}
