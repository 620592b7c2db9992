import { randomBytes } from "node:crypto";
import { createServer } from "node:http";
import { getRequestListener } from "@hono/node-server";
import type { Credentials } from "google-auth-library";
import { Hono } from "hono";
import { AuthorizationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Credential } from "../types.js";
import type { OAuthClientSecrets } from "./clientSecrets.js";
import { createOAuthClient, credentialFromTokens } from "./googleAuth.js";

export const CALLBACK_PATH = "/oauth2callback";

export interface ConsentFlow {
  run(secrets: OAuthClientSecrets, scopes: string[]): Promise<Credential>;
}

/** The slice of OAuth2Client the consent flow talks to. */
export interface ConsentClient {
  generateAuthUrl(options: {
    access_type: string;
    prompt: string;
    scope: string[];
    state: string;
  }): string;
  getToken(code: string): Promise<{ tokens: Credentials }>;
}

export interface CallbackServer {
  close(): void;
}

export interface CallbackHandlers {
  state: string;
  onCode: (code: string) => void;
  onError: (error: Error) => void;
}

export function createCallbackApp({ state, onCode, onError }: CallbackHandlers): Hono {
  const app = new Hono();

  app.get(CALLBACK_PATH, (c) => {
    // Callbacks without our nonce did not come from Google's redirect; ignore them.
    if (c.req.query("state") !== state) {
      return c.text("State mismatch.", 400);
    }

    const error = c.req.query("error");
    if (error) {
      onError(new AuthorizationError(`Consent was declined: ${error}`));
      return c.text("Authorization was declined. You can close this window.", 403);
    }

    const code = c.req.query("code");
    if (!code) {
      return c.text("Missing authorization code.", 400);
    }

    onCode(code);
    return c.text("Authorization complete. You can close this window.");
  });

  return app;
}

export interface LoopbackConsentFlowOptions {
  port: number;
  logger: Logger;
  /** Where the consent URL goes; defaults to the log. */
  onAuthUrl?: (url: string) => void;
  createClient?: (secrets: OAuthClientSecrets, redirectUri: string) => ConsentClient;
  startServer?: (app: Hono, port: number, onError: (error: Error) => void) => CallbackServer;
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function startNodeServer(app: Hono, port: number, onError: (error: Error) => void): CallbackServer {
  const server = createServer(getRequestListener((request, env) => app.fetch(request, env)));
  server.on("error", onError);
  server.listen(port, "127.0.0.1");
  return server;
}

/**
 * Installed-app consent: serve a loopback callback, hand the user the consent
 * URL and wait for Google's redirect. There is no timeout; wrap the call if a
 * bounded wait is needed.
 */
export class LoopbackConsentFlow implements ConsentFlow {
  private port: number;
  private logger: Logger;
  private onAuthUrl: (url: string) => void;
  private createClient: (secrets: OAuthClientSecrets, redirectUri: string) => ConsentClient;
  private startServer: (
    app: Hono,
    port: number,
    onError: (error: Error) => void,
  ) => CallbackServer;

  constructor(options: LoopbackConsentFlowOptions) {
    this.port = options.port;
    this.logger = options.logger;
    this.onAuthUrl =
      options.onAuthUrl ?? ((url) => this.logger.info("oauth_consent_url", { url }));
    this.createClient = options.createClient ?? createOAuthClient;
    this.startServer = options.startServer ?? startNodeServer;
  }

  async run(secrets: OAuthClientSecrets, scopes: string[]): Promise<Credential> {
    const redirectUri = `http://127.0.0.1:${this.port}${CALLBACK_PATH}`;
    const client = this.createClient(secrets, redirectUri);
    const state = randomBytes(16).toString("hex");

    const code = deferred<string>();
    const app = createCallbackApp({ state, onCode: code.resolve, onError: code.reject });
    const server = this.startServer(app, this.port, code.reject);

    try {
      const authUrl = client.generateAuthUrl({
        access_type: "offline",
        prompt: "consent",
        scope: scopes,
        state,
      });
      this.logger.info("oauth_consent_started", { redirectUri, scopes });
      this.onAuthUrl(authUrl);

      const { tokens } = await client.getToken(await code.promise);
      const credential = credentialFromTokens(tokens);
      this.logger.info("oauth_consent_completed", {
        scopes: credential.scopes,
        hasRefreshToken: Boolean(credential.refreshToken),
      });
      return credential;
    } finally {
      server.close();
    }
  }
}
