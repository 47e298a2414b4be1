import { describe, expect, it, vi } from "vitest";
import { CredentialStoreService } from "../../src/credentials/credential-store.service.js";
import { ConfigMissingError, TenantNotFoundError } from "../../src/errors/index.js";
import { credentialRecord, credentialsBlob, staticSource } from "../helpers.js";

describe("CredentialStoreService", () => {
  describe("load", () => {
    it("should map wire records to tenant credentials", async () => {
      const store = new CredentialStoreService(staticSource(credentialsBlob(["team-x"])));

      const credential = await store.get("team-x");

      expect(credential).toEqual({
        tenantId: "team-x",
        oauthClientId: "team-x-client",
        oauthClientSecret: "test-secret",
        oauthTokenUrl: "https://auth.team-x.example.com/oauth/token",
        apiBaseUrl: "https://api.team-x.example.com",
        resourceGroup: "default",
      });
    });

    it("should strip trailing slashes from the API URL", async () => {
      const record = { ...credentialRecord("team-x"), apiUrl: "https://api.example.com//" };
      const store = new CredentialStoreService(staticSource(JSON.stringify([record])));

      const credential = await store.get("team-x");

      expect(credential.apiBaseUrl).toBe("https://api.example.com");
    });

    it("should read the source once for concurrent first callers", async () => {
      const read = vi.fn().mockResolvedValue(credentialsBlob(["team-x", "team-y"]));
      const store = new CredentialStoreService({ read });

      const [first, second, third] = await Promise.all([store.load(), store.load(), store.load()]);

      expect(read).toHaveBeenCalledTimes(1);
      expect(first).toBe(second);
      expect(second).toBe(third);
      expect([...first.keys()]).toEqual(["team-x", "team-y"]);
    });

    it("should fail with ConfigMissing when no blob is configured", async () => {
      const store = new CredentialStoreService(staticSource(undefined));

      await expect(store.load()).rejects.toThrow(ConfigMissingError);
      await expect(store.load()).rejects.toThrow("no credentials configured");
    });

    it("should fail with ConfigMissing on a whitespace-only blob", async () => {
      const store = new CredentialStoreService(staticSource("   "));

      await expect(store.load()).rejects.toThrow(ConfigMissingError);
    });

    it("should fail with ConfigMissing on malformed JSON", async () => {
      const store = new CredentialStoreService(staticSource("[{not json"));

      await expect(store.load()).rejects.toThrow(/not valid JSON/);
    });

    it("should fail with ConfigMissing when a record is incomplete", async () => {
      const store = new CredentialStoreService(staticSource(JSON.stringify([{ team: "team-x" }])));

      await expect(store.load()).rejects.toThrow(/invalid credentials: 0\.clientId/);
    });

    it("should keep a failed load for the process lifetime", async () => {
      const read = vi
        .fn()
        .mockResolvedValueOnce(undefined)
        .mockResolvedValue(credentialsBlob(["team-x"]));
      const store = new CredentialStoreService({ read });

      const firstError = await store.load().catch((error: unknown) => error);
      const secondError = await store.load().catch((error: unknown) => error);

      expect(firstError).toBeInstanceOf(ConfigMissingError);
      expect(secondError).toBe(firstError);
      expect(read).toHaveBeenCalledTimes(1);
    });

    it("should wrap source errors as ConfigMissing", async () => {
      const store = new CredentialStoreService({
        read: vi.fn().mockRejectedValue(new Error("EACCES: permission denied")),
      });

      const error = await store.load().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigMissingError);
      expect(error).toHaveProperty("kind", "ConfigMissing");
    });
  });

  describe("get", () => {
    it("should fail with TenantNotFound for unknown tenants", async () => {
      const store = new CredentialStoreService(staticSource(credentialsBlob(["team-x"])));

      await expect(store.get("team-q")).rejects.toThrow(TenantNotFoundError);
    });
  });

  describe("has and tenantIds", () => {
    it("should report configured tenants in blob order", async () => {
      const store = new CredentialStoreService(staticSource(credentialsBlob(["team-y", "team-x"])));

      expect(await store.has("team-x")).toBe(true);
      expect(await store.has("team-z")).toBe(false);
      expect(await store.tenantIds()).toEqual(["team-y", "team-x"]);
    });
  });
});
