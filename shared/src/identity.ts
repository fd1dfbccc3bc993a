import { createHash } from "node:crypto";
import { UnauthorizedError } from "./errors.js";
import type { PrincipalIdentity, PrincipalStore } from "./principals.js";
import type { Principal } from "./types.js";

export const API_KEY_HEADER = "x-api-key";

export const ANONYMOUS_IDENTITY: PrincipalIdentity = {
  email: "anonymous@localhost",
  fullName: "Anonymous",
};

export interface ApiKeyEntry {
  token: string;
  email: string;
  fullName: string;
  admin: boolean;
}

export interface ResolvedIdentity {
  principal: Principal;
  /** Elevated callers may read and list every principal's jobs. */
  admin: boolean;
}

function fingerprint(token: string): string {
  return createHash("sha256").update(token).digest("hex").slice(0, 12);
}

/**
 * Parse API_KEYS: comma-separated `token[:email[:Display Name[:admin]]]`.
 *
 * A bare token gets a synthetic address derived from its hash, so the same
 * token always lands on the same principal without the token itself ever
 * being stored.
 */
export function parseApiKeys(raw: string | null | undefined): ApiKeyEntry[] {
  if (!raw) return [];
  const entries: ApiKeyEntry[] = [];
  const seen = new Set<string>();

  for (const chunk of raw.split(",")) {
    const item = chunk.trim();
    if (!item) continue;
    const [token = "", email, fullName, flag] = item.split(":").map((part) => part.trim());
    if (!token) {
      throw new Error("API_KEYS contains an entry with an empty token");
    }
    if (seen.has(token)) {
      throw new Error(`API_KEYS lists the same token twice (${fingerprint(token)})`);
    }
    if (flag && flag.toLowerCase() !== "admin") {
      throw new Error(`API_KEYS entry flag must be "admin" (got "${flag}")`);
    }
    seen.add(token);

    const hash = fingerprint(token);
    entries.push({
      token,
      email: (email || `key-${hash}@api-keys.local`).toLowerCase(),
      fullName: fullName || `API key ${hash}`,
      admin: Boolean(flag),
    });
  }
  return entries;
}

/**
 * Maps the X-API-Key credential to a principal row, creating it on first
 * use. With no keys configured every caller is the anonymous principal and
 * the header is ignored.
 */
export class IdentityResolver {
  private readonly byToken: Map<string, ApiKeyEntry>;

  constructor(
    private readonly principals: PrincipalStore,
    keys: readonly ApiKeyEntry[]
  ) {
    this.byToken = new Map(keys.map((entry) => [entry.token, entry]));
  }

  get requiresKey(): boolean {
    return this.byToken.size > 0;
  }

  async resolve(credential: string | undefined): Promise<ResolvedIdentity> {
    if (!this.requiresKey) {
      const principal = await this.principals.upsertByEmail(ANONYMOUS_IDENTITY);
      return { principal, admin: false };
    }

    const token = credential?.trim();
    if (!token) {
      throw new UnauthorizedError("missing API key");
    }
    const entry = this.byToken.get(token);
    if (!entry) {
      throw new UnauthorizedError(`unrecognised API key ${fingerprint(token)}`);
    }

    const principal = await this.principals.upsertByEmail({ email: entry.email, fullName: entry.fullName });
    if (!principal.isActive) {
      throw new UnauthorizedError(`principal ${principal.id} is inactive`);
    }
    return { principal, admin: entry.admin };
  }
}
