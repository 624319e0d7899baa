/**
 * Strava Connector - OAuth credentials
 *
 * Exchanges the refresh token for a short-lived access token.
 * Strava may rotate the refresh token on any exchange; the new one is written
 * back to the .env file so the next run can authenticate.
 *
 * One instance per run, passed explicitly to whoever refreshes.
 */

import { updateEnvKey } from "../../lib/env-file.js";
import { AuthenticationError } from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";
import type { TokenResponse } from "./types.js";

const logger = setupLogger("strava-auth");

// Configuration
export const STRAVA_TOKEN_URL = "https://www.strava.com/oauth/token";
export const REFRESH_TOKEN_KEY = "STRAVA_REFRESH_TOKEN";

export interface StravaCredentialsInit {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  /** .env file the rotated refresh token is persisted to */
  envPath: string;
  tokenUrl?: string;
}

function isTokenResponse(value: unknown): value is TokenResponse {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class StravaCredentials {
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly envPath: string;
  private readonly tokenUrl: string;
  private currentRefreshToken: string;

  constructor(init: StravaCredentialsInit) {
    this.clientId = init.clientId;
    this.clientSecret = init.clientSecret;
    this.envPath = init.envPath;
    this.tokenUrl = init.tokenUrl ?? STRAVA_TOKEN_URL;
    this.currentRefreshToken = init.refreshToken;
  }

  get refreshToken(): string {
    return this.currentRefreshToken;
  }

  /**
   * Refresh grant against the token endpoint
   *
   * @returns Access token, valid for the rest of the run
   * @throws AuthenticationError if the refresh token is rejected or no access token comes back
   */
  async refreshAccessToken(): Promise<string> {
    const response = await fetch(this.tokenUrl, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        client_id: this.clientId,
        client_secret: this.clientSecret,
        grant_type: "refresh_token",
        refresh_token: this.currentRefreshToken,
      }),
    });

    logger.debug(`Token refresh HTTP ${response.status}`);

    if (response.status !== 200) {
      const text = await response.text();
      throw new AuthenticationError(
        `Token refresh failed: ${response.status} - ${text}`,
        response.status,
        text
      );
    }

    const data: unknown = await response.json();
    if (!isTokenResponse(data) || !data.access_token) {
      throw new AuthenticationError("No access_token in Strava response", response.status);
    }

    const rotated = data.refresh_token;
    if (rotated && rotated !== this.currentRefreshToken) {
      logger.warn(`Strava rotated refresh token, saving to ${this.envPath}`);
      await updateEnvKey(this.envPath, REFRESH_TOKEN_KEY, rotated);
      this.currentRefreshToken = rotated;
    }

    logger.info("Access token refreshed");
    return data.access_token;
  }
}
