import { describe, expect, it, vi } from "vitest";
import type { OAuthClientSecrets } from "../../src/auth/clientSecrets.js";
import type { ConsentFlow } from "../../src/auth/consentFlow.js";
import type { TokenRefresher } from "../../src/auth/googleAuth.js";
import { OAuthAuthorizer, classifyCredential } from "../../src/auth/oauthAuthorizer.js";
import { AuthorizationError, ConfigurationError } from "../../src/errors.js";
import { silentLogger } from "../../src/logger.js";
import type { Credential } from "../../src/types.js";

const NOW = 1_700_000_000_000;
const HOUR = 60 * 60 * 1000;
const secrets: OAuthClientSecrets = { clientId: "test-client", clientSecret: "test-secret" };

const validCredential: Credential = {
  accessToken: "test-access-valid",
  refreshToken: "test-refresh",
  expiresAt: NOW + HOUR,
  scopes: ["https://www.googleapis.com/auth/drive.file"],
};
const expiredCredential: Credential = { ...validCredential, accessToken: "test-access-old", expiresAt: NOW - HOUR };
const refreshedCredential: Credential = { ...validCredential, accessToken: "test-access-refreshed" };
const consentedCredential: Credential = {
  ...validCredential,
  accessToken: "test-access-consented",
  refreshToken: "test-refresh-consented",
};

function setup(stored: Credential | undefined) {
  const store = {
    load: vi.fn(async () => stored),
    save: vi.fn(async (_credential: Credential) => true),
  };
  const loadSecrets = vi.fn(async () => secrets);
  const refresh = vi.fn<TokenRefresher["refresh"]>(async () => refreshedCredential);
  const run = vi.fn<ConsentFlow["run"]>(async () => consentedCredential);
  const authorizer = new OAuthAuthorizer({
    store,
    loadSecrets,
    refresher: { refresh },
    consent: { run },
    logger: silentLogger,
    now: () => NOW,
  });
  return { authorizer, store, loadSecrets, refresh, run };
}

describe("classifyCredential", () => {
  it("distinguishes absent, expired and valid credentials", () => {
    expect(classifyCredential(undefined, NOW)).toEqual({ kind: "absent" });
    expect(classifyCredential(validCredential, NOW)).toEqual({ kind: "valid", credential: validCredential });
    expect(classifyCredential(expiredCredential, NOW)).toEqual({
      kind: "expired",
      credential: expiredCredential,
    });
  });

  it("treats a token inside the refresh threshold as expired", () => {
    const soon = { ...validCredential, expiresAt: NOW + 60_000 };
    expect(classifyCredential(soon, NOW, 5 * 60_000).kind).toBe("expired");
    expect(classifyCredential(soon, NOW, 0).kind).toBe("valid");
  });

  it("treats a missing expiry as valid and a missing access token as expired", () => {
    expect(classifyCredential({ accessToken: "test-access", scopes: [] }, NOW).kind).toBe("valid");
    expect(classifyCredential({ ...validCredential, accessToken: "" }, NOW).kind).toBe("expired");
  });
});

describe("OAuthAuthorizer", () => {
  it("returns a valid stored credential unchanged without touching the network", async () => {
    const { authorizer, store, loadSecrets, refresh, run } = setup(validCredential);

    await expect(authorizer.authorize()).resolves.toEqual(validCredential);
    expect(loadSecrets).not.toHaveBeenCalled();
    expect(refresh).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
    expect(store.save).not.toHaveBeenCalled();
  });

  it("yields identical state when called twice while valid", async () => {
    const { authorizer, refresh, store } = setup(validCredential);

    const first = await authorizer.authorize();
    const second = await authorizer.authorize();

    expect(second).toEqual(first);
    expect(refresh).not.toHaveBeenCalled();
    expect(store.save).not.toHaveBeenCalled();
  });

  it("runs consent when nothing is stored and saves the result once", async () => {
    const { authorizer, store, run } = setup(undefined);

    await expect(authorizer.authorize()).resolves.toEqual(consentedCredential);
    expect(run).toHaveBeenCalledWith(secrets, ["https://www.googleapis.com/auth/drive.file"]);
    expect(store.save).toHaveBeenCalledTimes(1);
    expect(store.save).toHaveBeenCalledWith(consentedCredential);
  });

  it("refreshes an expired credential without consent", async () => {
    const { authorizer, store, refresh, run } = setup(expiredCredential);

    await expect(authorizer.authorize()).resolves.toEqual(refreshedCredential);
    expect(refresh).toHaveBeenCalledWith(secrets, expiredCredential);
    expect(run).not.toHaveBeenCalled();
    expect(store.save).toHaveBeenCalledTimes(1);
    expect(store.save).toHaveBeenCalledWith(refreshedCredential);
  });

  it("falls back to consent when the refresh fails and saves exactly once", async () => {
    const { authorizer, store, refresh, run } = setup(expiredCredential);
    refresh.mockRejectedValueOnce(new Error("invalid_grant"));

    await expect(authorizer.authorize()).resolves.toEqual(consentedCredential);
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledTimes(1);
    expect(store.save).toHaveBeenCalledTimes(1);
    expect(store.save).toHaveBeenCalledWith(consentedCredential);
  });

  it("falls back to consent when the refresh returns a still-expired token", async () => {
    const { authorizer, refresh, run } = setup(expiredCredential);
    refresh.mockResolvedValueOnce({ ...expiredCredential, accessToken: "test-access-stale" });

    await expect(authorizer.authorize()).resolves.toEqual(consentedCredential);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("skips the refresh attempt when there is no refresh token", async () => {
    const { authorizer, refresh, run } = setup({ ...expiredCredential, refreshToken: undefined });

    await expect(authorizer.authorize()).resolves.toEqual(consentedCredential);
    expect(refresh).not.toHaveBeenCalled();
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("fails with AuthorizationError when refresh and consent both fail", async () => {
    const { authorizer, store, refresh, run } = setup(expiredCredential);
    refresh.mockRejectedValueOnce(new Error("network down"));
    run.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

    const error = await authorizer.authorize().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(AuthorizationError);
    expect(error).toHaveProperty("message", "Interactive consent failed: connect ECONNREFUSED");
    expect(store.save).not.toHaveBeenCalled();
  });

  it("propagates a declined consent as the AuthorizationError it is", async () => {
    const { authorizer, run } = setup(undefined);
    const declined = new AuthorizationError("Consent was declined: access_denied");
    run.mockRejectedValueOnce(declined);

    await expect(authorizer.authorize()).rejects.toBe(declined);
  });

  it("rejects a consent result that is not valid", async () => {
    const { authorizer, run, store } = setup(undefined);
    run.mockResolvedValueOnce({ ...consentedCredential, expiresAt: NOW - 1 });

    await expect(authorizer.authorize()).rejects.toBeInstanceOf(AuthorizationError);
    expect(store.save).not.toHaveBeenCalled();
  });

  it("fails with ConfigurationError and no fallback when client secrets are missing", async () => {
    const { authorizer, loadSecrets, refresh, run } = setup(expiredCredential);
    loadSecrets.mockRejectedValueOnce(new ConfigurationError("client_secret.json not found"));

    await expect(authorizer.authorize()).rejects.toBeInstanceOf(ConfigurationError);
    expect(refresh).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
  });

  it("still returns the credential when saving it fails", async () => {
    const { authorizer, store } = setup(undefined);
    store.save.mockResolvedValueOnce(false);

    await expect(authorizer.authorize()).resolves.toEqual(consentedCredential);
    expect(store.save).toHaveBeenCalledTimes(1);
  });

  it("shares one consent between concurrent callers", async () => {
    const { authorizer, store, run } = setup(undefined);

    const [first, second] = await Promise.all([authorizer.authorize(), authorizer.authorize()]);

    expect(first).toEqual(consentedCredential);
    expect(second).toEqual(consentedCredential);
    expect(run).toHaveBeenCalledTimes(1);
    expect(store.load).toHaveBeenCalledTimes(1);
    expect(store.save).toHaveBeenCalledTimes(1);
  });

  it("shares one refresh between concurrent callers", async () => {
    const { authorizer, refresh, run } = setup(expiredCredential);

    await Promise.all([authorizer.authorize(), authorizer.authorize(), authorizer.authorize()]);

    expect(refresh).toHaveBeenCalledTimes(1);
    expect(run).not.toHaveBeenCalled();
  });

  it("starts a new authorization once the shared one has failed", async () => {
    const { authorizer, store, run } = setup(undefined);
    run.mockRejectedValueOnce(new AuthorizationError("Consent was declined: access_denied"));

    const results = await Promise.allSettled([authorizer.authorize(), authorizer.authorize()]);
    expect(results.map((result) => result.status)).toEqual(["rejected", "rejected"]);

    await expect(authorizer.authorize()).resolves.toEqual(consentedCredential);
    expect(run).toHaveBeenCalledTimes(2);
    expect(store.load).toHaveBeenCalledTimes(2);
  });
});
