import { type Credentials, OAuth2Client } from "google-auth-library";
import type { Credential } from "../types.js";
import type { OAuthClientSecrets } from "./clientSecrets.js";

export const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive.file"];

export function createOAuthClient(secrets: OAuthClientSecrets, redirectUri?: string): OAuth2Client {
  return new OAuth2Client({
    clientId: secrets.clientId,
    clientSecret: secrets.clientSecret,
    redirectUri,
  });
}

/**
 * Maps a token endpoint response onto a Credential. Fields the server leaves
 * out (Google omits the refresh token and sometimes the scope on refresh) are
 * carried over from `previous`.
 */
export function credentialFromTokens(tokens: Credentials, previous?: Credential): Credential {
  if (!tokens.access_token) {
    throw new Error("Token response is missing access_token");
  }
  const credential: Credential = {
    accessToken: tokens.access_token,
    scopes: tokens.scope
      ? tokens.scope.split(" ").filter((scope) => scope !== "")
      : [...(previous?.scopes ?? [])],
  };
  const refreshToken = tokens.refresh_token ?? previous?.refreshToken;
  if (refreshToken) credential.refreshToken = refreshToken;
  if (typeof tokens.expiry_date === "number") credential.expiresAt = tokens.expiry_date;
  return credential;
}

export interface TokenRefresher {
  refresh(secrets: OAuthClientSecrets, credential: Credential): Promise<Credential>;
}

export class GoogleTokenRefresher implements TokenRefresher {
  async refresh(secrets: OAuthClientSecrets, credential: Credential): Promise<Credential> {
    if (!credential.refreshToken) {
      throw new Error("Credential has no refresh token");
    }
    const client = createOAuthClient(secrets);
    client.setCredentials({ refresh_token: credential.refreshToken });
    const { credentials } = await client.refreshAccessToken();
    return credentialFromTokens(credentials, credential);
  }
}

/**
 * An OAuth2Client bound to an already-valid access token. It carries no client
 * secret, so it cannot refresh on its own: renewing is the authorizer's job.
 */
export function createAuthorizedClient(credential: Credential): OAuth2Client {
  const client = new OAuth2Client();
  // Without expiry_date and refresh_token the client never attempts its own refresh.
  client.setCredentials({
    access_token: credential.accessToken,
    token_type: "Bearer",
    scope: credential.scopes.join(" "),
  });
  return client;
}
