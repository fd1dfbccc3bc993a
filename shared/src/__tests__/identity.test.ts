import { createHash } from "node:crypto";
import { UnauthorizedError } from "../errors.js";
import { IdentityResolver, parseApiKeys } from "../identity.js";
import { MemoryDatabase, MemoryPrincipalStore } from "../memoryStore.js";

const hashOf = (token: string) => createHash("sha256").update(token).digest("hex").slice(0, 12);

describe("parseApiKeys", () => {
  it("returns nothing when unset", () => {
    expect(parseApiKeys(null)).toEqual([]);
    expect(parseApiKeys("")).toEqual([]);
  });

  it("parses full and bare entries", () => {
    const keys = parseApiKeys("test-secret:Ops@Example.com:Ops Team:admin, test-key-2");
    expect(keys).toEqual([
      { token: "test-secret", email: "ops@example.com", fullName: "Ops Team", admin: true },
      {
        token: "test-key-2",
        email: `key-${hashOf("test-key-2")}@api-keys.local`,
        fullName: `API key ${hashOf("test-key-2")}`,
        admin: false,
      },
    ]);
  });

  it("rejects duplicate tokens and unknown flags", () => {
    expect(() => parseApiKeys("test-secret,test-secret")).toThrow(/same token twice/);
    expect(() => parseApiKeys("test-secret:a@example.com:A:root")).toThrow('flag must be "admin" (got "root")');
    expect(() => parseApiKeys(":a@example.com")).toThrow(/empty token/);
  });
});

describe("IdentityResolver", () => {
  function setup(rawKeys: string | null) {
    const db = new MemoryDatabase();
    const principals = new MemoryPrincipalStore(db);
    return { db, principals, resolver: new IdentityResolver(principals, parseApiKeys(rawKeys)) };
  }

  it("maps every caller to the anonymous principal when no keys are configured", async () => {
    const { principals, resolver } = setup(null);
    expect(resolver.requiresKey).toBe(false);
    const a = await resolver.resolve(undefined);
    const b = await resolver.resolve("anything");
    expect(a.principal.id).toBe(b.principal.id);
    expect(a.principal.email).toBe("anonymous@localhost");
    expect(a.admin).toBe(false);
    expect(principals.count()).toBe(1);
  });

  it("resolves the same token to the same principal", async () => {
    const { principals, resolver } = setup("test-secret:user@example.com:User");
    const [a, b] = await Promise.all([resolver.resolve("test-secret"), resolver.resolve(" test-secret ")]);
    expect(a.principal.id).toBe(b.principal.id);
    expect(a.principal.email).toBe("user@example.com");
    expect(principals.count()).toBe(1);
  });

  it("rejects missing and unknown keys", async () => {
    const { principals, resolver } = setup("test-secret");
    await expect(resolver.resolve(undefined)).rejects.toBeInstanceOf(UnauthorizedError);
    await expect(resolver.resolve("wrong-key")).rejects.toBeInstanceOf(UnauthorizedError);
    expect(principals.count()).toBe(0);
  });

  it("rejects inactive principals", async () => {
    const { db, resolver } = setup("test-secret");
    const { principal } = await resolver.resolve("test-secret");
    await db.setPrincipalActive(principal.id, false);
    await expect(resolver.resolve("test-secret")).rejects.toMatchObject({ status: 401 });
  });

  it("flags admin keys", async () => {
    const { resolver } = setup("test-secret:ops@example.com:Ops:admin");
    expect((await resolver.resolve("test-secret")).admin).toBe(true);
  });
});
