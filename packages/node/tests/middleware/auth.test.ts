/**
 * Tests for API-key authentication and role guards.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { authMiddleware, requireRole } from "../../src/middleware/auth.js";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import { hasCapability, ROLE_CAPABILITIES } from "../../src/types/auth.js";
import { createTestApp, jsonRequest, KEYS } from "../setup.js";

function guardedApp(): Hono<AppEnv> {
  const records: ApiKeyRecord[] = [
    { key: "k-admin", role: "admin", principal: "ops" },
    { key: "k-user", role: "user", principal: "alice" },
  ];
  const app = new Hono<AppEnv>();
  app.use("*", authMiddleware({ apiKeys: new Map(records.map((r) => [r.key, r])) }));
  app.get("/whoami", (c) => c.json(c.get("auth")));
  app.get("/admin", requireRole("admin"), (c) => c.json({ ok: true }));
  return app;
}

describe("authMiddleware", () => {
  it("rejects requests without a key", async () => {
    const res = await guardedApp().request("/whoami");
    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("rejects unknown keys", async () => {
    const res = await guardedApp().request("/whoami", { headers: { "X-Api-Key": "nope" } });
    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { message: string } };
    expect(body.error.message).toBe("Invalid API key");
  });

  it("resolves the principal and role of a known key", async () => {
    const res = await guardedApp().request("/whoami", { headers: { "X-Api-Key": "k-user" } });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ type: "api-key", principal: "alice", role: "user" });
  });
});

describe("requireRole", () => {
  it("lets a listed role through", async () => {
    const res = await guardedApp().request("/admin", { headers: { "X-Api-Key": "k-admin" } });
    expect(res.status).toBe(200);
  });

  it("returns 403 for other roles", async () => {
    const res = await guardedApp().request("/admin", { headers: { "X-Api-Key": "k-user" } });
    expect(res.status).toBe(403);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "FORBIDDEN",
      message: "Role 'user' may not access this endpoint",
    });
  });
});

describe("role capabilities", () => {
  it("maps roles onto vault capabilities", () => {
    expect(ROLE_CAPABILITIES.admin).toEqual(["asset-admin", "registration", "backend"]);
    expect(hasCapability("registrar", "registration")).toBe(true);
    expect(hasCapability("registrar", "backend")).toBe(false);
    expect(hasCapability("backend", "backend")).toBe(true);
    expect(hasCapability("user", "registration")).toBe(false);
  });

  it("grants the configured principals their capabilities in the vault", () => {
    const { service } = createTestApp();
    expect(service.authorizer.capabilitiesOf("ops")).toEqual([
      "asset-admin",
      "backend",
      "registration",
    ]);
    expect(service.authorizer.capabilitiesOf("alice")).toEqual([]);
  });
});

describe("app wiring", () => {
  it("leaves health routes open and guards /api", async () => {
    const { app } = createTestApp();
    expect((await app.request("/health")).status).toBe(200);
    expect((await app.request("/api/v1/assets")).status).toBe(401);
    expect((await app.request(jsonRequest("/api/v1/assets", "GET", undefined, KEYS.alice))).status).toBe(200);
  });
});
