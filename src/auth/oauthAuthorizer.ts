import { AuthorizationError, ConfigurationError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Credential, CredentialState } from "../types.js";
import type { OAuthClientSecrets } from "./clientSecrets.js";
import type { ConsentFlow } from "./consentFlow.js";
import type { CredentialStore } from "./credentialStore.js";
import { DRIVE_SCOPES, type TokenRefresher } from "./googleAuth.js";

export const DEFAULT_REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

/** Classification never yields a fault; faults come from failed refreshes. */
export type ClassifiedCredential = Exclude<CredentialState, { kind: "fault" }>;

export function classifyCredential(
  credential: Credential | undefined,
  now: number,
  thresholdMs = DEFAULT_REFRESH_THRESHOLD_MS,
): ClassifiedCredential {
  if (!credential) return { kind: "absent" };
  if (!credential.accessToken) return { kind: "expired", credential };
  if (credential.expiresAt !== undefined && credential.expiresAt - thresholdMs <= now) {
    return { kind: "expired", credential };
  }
  return { kind: "valid", credential };
}

export interface OAuthAuthorizerOptions {
  store: Pick<CredentialStore, "load" | "save">;
  /** Read only when a refresh or consent is needed. */
  loadSecrets: () => Promise<OAuthClientSecrets>;
  refresher: TokenRefresher;
  consent: ConsentFlow;
  logger: Logger;
  scopes?: string[];
  refreshThresholdMs?: number;
  now?: () => number;
}

/**
 * Keeps a Drive credential usable across runs:
 * absent → consent, expired → refresh (falling back to consent), valid → as is.
 * Every credential produced by refresh or consent is saved before it is returned.
 */
export class OAuthAuthorizer {
  private store: Pick<CredentialStore, "load" | "save">;
  private loadSecrets: () => Promise<OAuthClientSecrets>;
  private refresher: TokenRefresher;
  private consent: ConsentFlow;
  private logger: Logger;
  private scopes: string[];
  private refreshThresholdMs: number;
  private now: () => number;
  private inFlight?: Promise<Credential>;

  constructor(options: OAuthAuthorizerOptions) {
    this.store = options.store;
    this.loadSecrets = options.loadSecrets;
    this.refresher = options.refresher;
    this.consent = options.consent;
    this.logger = options.logger;
    this.scopes = options.scopes ?? DRIVE_SCOPES;
    this.refreshThresholdMs = options.refreshThresholdMs ?? DEFAULT_REFRESH_THRESHOLD_MS;
    this.now = options.now ?? Date.now;
  }

  /** Concurrent callers share one authorization; the next call after it settles starts afresh. */
  authorize(): Promise<Credential> {
    if (!this.inFlight) {
      this.inFlight = this.resolveCredential().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async resolveCredential(): Promise<Credential> {
    const state = classifyCredential(await this.store.load(), this.now(), this.refreshThresholdMs);
    this.logger.debug("oauth_credential_state", { state: state.kind });

    switch (state.kind) {
      case "valid":
        return state.credential;
      case "absent":
        return this.persist(await this.runConsent(await this.secrets()));
      case "expired":
        return this.persist(await this.recoverExpired(state.credential));
    }
  }

  private async recoverExpired(credential: Credential): Promise<Credential> {
    const secrets = await this.secrets();
    if (!credential.refreshToken) {
      this.logger.info("oauth_refresh_skipped_no_refresh_token");
      return this.runConsent(secrets);
    }

    const refreshed = await this.tryRefresh(secrets, credential);
    if (refreshed.kind === "valid") {
      this.logger.info("oauth_refresh_succeeded", { expiresAt: refreshed.credential.expiresAt });
      return refreshed.credential;
    }
    this.logger.warn("oauth_refresh_failed_falling_back_to_consent", {
      reason: refreshed.kind === "fault" ? refreshed.reason : `refreshed token is ${refreshed.kind}`,
    });
    return this.runConsent(secrets);
  }

  private async tryRefresh(
    secrets: OAuthClientSecrets,
    credential: Credential,
  ): Promise<CredentialState> {
    try {
      const refreshed = await this.refresher.refresh(secrets, credential);
      return classifyCredential(refreshed, this.now(), this.refreshThresholdMs);
    } catch (error) {
      return { kind: "fault", reason: errorMessage(error, "Token refresh failed") };
    }
  }

  private async runConsent(secrets: OAuthClientSecrets): Promise<Credential> {
    let credential: Credential;
    try {
      credential = await this.consent.run(secrets, this.scopes);
    } catch (error) {
      if (error instanceof AuthorizationError || error instanceof ConfigurationError) throw error;
      throw new AuthorizationError(`Interactive consent failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const state = classifyCredential(credential, this.now(), this.refreshThresholdMs);
    if (state.kind !== "valid") {
      throw new AuthorizationError(`Consent flow returned an ${state.kind} credential`);
    }
    return state.credential;
  }

  private async secrets(): Promise<OAuthClientSecrets> {
    try {
      return await this.loadSecrets();
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      throw new ConfigurationError(`Cannot load OAuth client secrets: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async persist(credential: Credential): Promise<Credential> {
    const saved = await this.store.save(credential);
    if (!saved) {
      this.logger.warn("oauth_credential_not_persisted");
    }
    return credential;
  }
}
