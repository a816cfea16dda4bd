/**
 * Fitbit - OAuth 2.0 authorization
 *
 * Authorization code flow with a one-shot local callback listener,
 * token refresh, introspection, and a per-account JSON token store.
 *
 * Token resolution order (getAccessToken):
 * 1. stored token that introspects as active
 * 2. refreshed stored token
 * 3. full authorization in the browser
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { createServer } from "node:http";
import type { AddressInfo } from "node:net";
import { join } from "node:path";
import { z } from "zod";
import { AuthError } from "../../lib/errors.js";
import { setupLogger } from "../../lib/logger.js";
import { FITBIT_API_BASE } from "./api-client.js";
import type { QuotaTracker } from "./quota-tracker.js";

const logger = setupLogger("fitbit-auth");

export const FITBIT_AUTHORIZE_URL = "https://www.fitbit.com/oauth2/authorize";
export const FITBIT_SCOPES = [
  "activity",
  "heartrate",
  "location",
  "nutrition",
  "profile",
  "settings",
  "sleep",
  "social",
  "weight",
  "oxygen_saturation",
] as const;

const TokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  user_id: z.string().min(1),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

export type TokenData = z.infer<typeof TokenSchema>;

const IntrospectSchema = z.object({ active: z.boolean().default(false) });

// =============================================================================
// Token store
// =============================================================================

export class TokenStore {
  private readonly tokenDir: string;

  constructor(tokenDir: string) {
    this.tokenDir = tokenDir;
  }

  pathFor(account: string): string {
    return join(this.tokenDir, `token_${account}.json`);
  }

  /**
   * @returns null when the account has no saved token
   * @throws AuthError if the saved file is not a token
   */
  async load(account: string): Promise<TokenData | null> {
    const path = this.pathFor(account);
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new AuthError(`Invalid token file ${path}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = TokenSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthError(`Invalid token file ${path}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    return parsed.data;
  }

  async save(account: string, token: TokenData): Promise<void> {
    await mkdir(this.tokenDir, { recursive: true });
    await writeFile(this.pathFor(account), JSON.stringify(token), "utf-8");
    logger.debug(`Token saved for ${account}`);
  }
}

// =============================================================================
// OAuth client
// =============================================================================

export interface AuthOptions {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  apiBase?: string;
  /** Updated from token endpoint responses when given */
  quota?: QuotaTracker;
}

export class FitbitAuth {
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly redirectUri: string;
  private readonly apiBase: string;
  private readonly quota: QuotaTracker | null;

  constructor(options: AuthOptions) {
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.redirectUri = options.redirectUri;
    this.apiBase = (options.apiBase ?? FITBIT_API_BASE).replace(/\/+$/, "");
    this.quota = options.quota ?? null;
  }

  /**
   * @param forceLogin - Ask Fitbit to show the login and consent screens again
   */
  buildAuthorizationUrl(forceLogin: boolean = true): string {
    const params = new URLSearchParams({
      response_type: "code",
      client_id: this.clientId,
      redirect_uri: this.redirectUri,
      scope: FITBIT_SCOPES.join(" "),
    });
    if (forceLogin) {
      params.set("prompt", "login consent");
    }
    return `${FITBIT_AUTHORIZE_URL}?${params.toString()}`;
  }

  async exchangeCodeForToken(code: string): Promise<TokenData> {
    return this.requestToken(
      new URLSearchParams({
        code,
        redirect_uri: this.redirectUri,
        grant_type: "authorization_code",
      }),
      "Failed to exchange credentials"
    );
  }

  async refreshAccessToken(refreshToken: string): Promise<TokenData> {
    return this.requestToken(
      new URLSearchParams({
        grant_type: "refresh_token",
        refresh_token: refreshToken,
      }),
      "Failed to refresh token"
    );
  }

  /**
   * Whether the introspection endpoint reports the token as active.
   */
  async validateToken(accessToken: string): Promise<boolean> {
    const response = await fetch(`${this.apiBase}/1.1/oauth2/introspect`, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Bearer ${accessToken}`,
      },
      body: new URLSearchParams({ token: accessToken }),
    });

    if (response.status !== 200) {
      logger.error(`Token introspection failed: ${await response.text()}`);
      return false;
    }

    const parsed = IntrospectSchema.safeParse(await response.json());
    return parsed.success && parsed.data.active;
  }

  private async requestToken(body: URLSearchParams, failure: string): Promise<TokenData> {
    const response = await fetch(`${this.apiBase}/oauth2/token`, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Basic ${Buffer.from(`${this.clientId}:${this.clientSecret}`).toString("base64")}`,
      },
      body,
    });
    this.quota?.update(response.headers);

    if (response.status === 429) {
      const resetSeconds = this.quota?.snapshot().resetSeconds ?? response.headers.get("fitbit-rate-limit-reset");
      throw new AuthError(`Too many requests, try again in: ${resetSeconds} seconds.`, 429);
    }
    if (response.status !== 200) {
      const text = await response.text();
      logger.error(`Token request error: ${response.status} - ${text}`);
      throw new AuthError(`${failure}: ${text}`, response.status);
    }

    const parsed = TokenSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AuthError(`${failure}: unexpected token response`, response.status);
    }
    return parsed.data;
  }
}

// =============================================================================
// Callback listener
// =============================================================================

export interface CallbackListener {
  /** Bound port (differs from the requested one when 0 was requested) */
  port: number;
  /** Resolves with the first authorization code received */
  code: Promise<string>;
  close(): Promise<void>;
}

/**
 * Listen for the OAuth redirect. The first request carrying ?code= is
 * answered, resolves `code`, and stops the listener. Other paths get 404.
 */
export async function listenForAuthorizationCode(
  port: number,
  host: string = "localhost"
): Promise<CallbackListener> {
  let resolveCode: (code: string) => void = () => {};
  const code = new Promise<string>((resolve) => {
    resolveCode = resolve;
  });

  const server = createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${host}`);
    const received = url.searchParams.get("code");

    if (url.pathname !== "/" || received === null) {
      res.writeHead(404, { "Content-Type": "text/plain", Connection: "close" });
      res.end("Not Found.");
      return;
    }

    res.writeHead(200, { "Content-Type": "text/html", Connection: "close" });
    res.end("Authentication successful. You can close this tab.");
    server.close();
    resolveCode(received);
  });

  const close = (): Promise<void> =>
    new Promise((resolve) => {
      if (!server.listening) {
        resolve();
        return;
      }
      server.close(() => resolve());
    });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address: AddressInfo | string | null = server.address();
  const boundPort = address !== null && typeof address === "object" ? address.port : port;
  logger.info("Server started, waiting for authentication...");

  return { port: boundPort, code, close };
}

export async function waitForAuthorizationCode(port: number, host?: string): Promise<string> {
  const listener = await listenForAuthorizationCode(port, host);
  return listener.code;
}

// =============================================================================
// Token resolution
// =============================================================================

export interface AccessTokenOptions {
  account: string;
  /** Callback listener port */
  port: number;
  /** Shows the authorization URL to the user; logs it by default */
  openUrl?: (url: string) => void;
  waitForCode?: (port: number) => Promise<string>;
}

/**
 * Resolve a usable token for the account and persist whatever was obtained.
 *
 * @throws AuthError if full authorization fails
 */
export async function getAccessToken(
  auth: FitbitAuth,
  store: TokenStore,
  options: AccessTokenOptions
): Promise<TokenData> {
  const stored = await store.load(options.account);

  if (stored) {
    if (await auth.validateToken(stored.access_token)) {
      logger.info("Using stored token.");
      return stored;
    }

    logger.warn("Stored token is invalid or expired, trying to refresh.");
    try {
      const refreshed = await auth.refreshAccessToken(stored.refresh_token);
      await store.save(options.account, refreshed);
      logger.info("Token refreshed successfully.");
      return refreshed;
    } catch (error) {
      logger.warn(`Token refresh failed, performing full authorization: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const url = auth.buildAuthorizationUrl();
  const openUrl = options.openUrl ?? ((target: string) => logger.info(`Open this URL to authorize: ${target}`));
  const waitForCode = options.waitForCode ?? waitForAuthorizationCode;

  const code = waitForCode(options.port);
  openUrl(url);
  const tokens = await auth.exchangeCodeForToken(await code);
  await store.save(options.account, tokens);
  logger.info("Authorization completed.");
  return tokens;
}
