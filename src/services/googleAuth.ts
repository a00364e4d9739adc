// src/services/googleAuth.ts
import pool from "../lib/db";
import * as logger from "../lib/logger";
import { readJson, str } from "../lib/json";
import { getSettings } from "../config/settings";
import { openRefreshToken, sealRefreshToken } from "./googleCrypto";

const TOKEN_URL = "https://oauth2.googleapis.com/token";

export const GOOGLE_SCOPES = [
  "https://www.googleapis.com/auth/calendar",
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/userinfo.email",
];

export type GoogleIntegrationRow = {
  account_id: string;
  connected_email: string | null;
  status: string;
  last_error: string | null;
  created_at: Date | null;
  updated_at: Date | null;
};

export async function markGoogleDisconnected(accountId: string, reason: string) {
  try {
    await pool.query(
      `
      UPDATE google_integrations
         SET status = 'disconnected',
             last_error = $2,
             updated_at = NOW()
       WHERE account_id = $1
      `,
      [accountId, reason]
    );
  } catch (e) {
    // The caller is already failing with a clearer error.
    logger.error("❌ [GOOGLE] markGoogleDisconnected failed:", e);
  }
}

async function getRefreshTokenEnc(accountId: string): Promise<string> {
  const { rows } = await pool.query<{ refresh_token_enc: string | null }>(
    `
    SELECT refresh_token_enc
      FROM google_integrations
     WHERE account_id = $1
       AND status = 'connected'
     LIMIT 1
    `,
    [accountId]
  );

  const enc = rows[0]?.refresh_token_enc;
  if (!enc) throw new Error("google_not_connected");
  return enc;
}

export async function getGoogleAccessToken(accountId: string): Promise<string> {
  const refresh_token = openRefreshToken(accountId, await getRefreshTokenEnc(accountId));
  if (!refresh_token) throw new Error("google_refresh_token_invalid");

  const { clientId, clientSecret } = getSettings().google;
  if (!clientId || !clientSecret) throw new Error("google_oauth_not_configured");

  const resp = await fetch(TOKEN_URL, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: new URLSearchParams({
      client_id: clientId,
      client_secret: clientSecret,
      refresh_token,
      grant_type: "refresh_token",
    }).toString(),
  });

  const json = await readJson(resp);
  const accessToken = str(json.access_token);

  if (!resp.ok || !accessToken) {
    logger.error("❌ [GOOGLE] refresh failed:", resp.status, json.error);

    // Revoked or expired grant: the advisor has to reconnect.
    if (json.error === "invalid_grant" || resp.status === 401 || resp.status === 403) {
      await markGoogleDisconnected(accountId, "invalid_grant");
      throw new Error("google_not_connected");
    }

    await pool.query(
      `UPDATE google_integrations SET last_error = $2, updated_at = NOW() WHERE account_id = $1`,
      [accountId, `refresh_${resp.status}_${str(json.error) || "unknown"}`]
    );
    throw new Error("google_refresh_failed");
  }

  return accessToken;
}

/**
 * Authorized request to a Google API. 401/403 marks the integration
 * disconnected; the response is returned either way.
 */
export async function googleFetch(accountId: string, url: string, init: RequestInit = {}): Promise<Response> {
  const accessToken = await getGoogleAccessToken(accountId);

  const resp = await fetch(url, {
    ...init,
    headers: {
      Authorization: `Bearer ${accessToken}`,
      "Content-Type": "application/json",
    },
  });

  if (resp.status === 401 || resp.status === 403) {
    await markGoogleDisconnected(accountId, `api_${resp.status}`);
  }
  return resp;
}

export async function exchangeAuthCode(code: string): Promise<{ refreshToken: string | null; accessToken: string | null }> {
  const { clientId, clientSecret, redirectUrl } = getSettings().google;

  const resp = await fetch(TOKEN_URL, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: new URLSearchParams({
      code,
      client_id: clientId,
      client_secret: clientSecret,
      redirect_uri: redirectUrl,
      grant_type: "authorization_code",
    }).toString(),
  });

  const json = await readJson(resp);
  if (!resp.ok) {
    logger.error("❌ [GOOGLE] token exchange failed:", resp.status, json.error);
    throw new Error("google_token_exchange_failed");
  }

  return { refreshToken: str(json.refresh_token) ?? null, accessToken: str(json.access_token) ?? null };
}

export async function fetchConnectedEmail(accessToken: string): Promise<string | null> {
  try {
    const resp = await fetch("https://www.googleapis.com/oauth2/v2/userinfo", {
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    return str((await readJson(resp)).email) ?? null;
  } catch (e) {
    logger.warn("⚠️ [GOOGLE] userinfo failed:", e instanceof Error ? e.message : e);
    return null;
  }
}

export async function saveGoogleIntegration(accountId: string, refreshToken: string, connectedEmail: string | null) {
  await pool.query(
    `
    INSERT INTO google_integrations
      (account_id, refresh_token_enc, connected_email, status, last_error, updated_at)
    VALUES
      ($1, $2, $3, 'connected', NULL, NOW())
    ON CONFLICT (account_id)
    DO UPDATE SET
      refresh_token_enc = EXCLUDED.refresh_token_enc,
      connected_email   = EXCLUDED.connected_email,
      status            = 'connected',
      last_error        = NULL,
      updated_at        = NOW()
    `,
    [accountId, sealRefreshToken(accountId, refreshToken), connectedEmail]
  );
}

export async function getGoogleIntegration(accountId: string): Promise<GoogleIntegrationRow | null> {
  const { rows } = await pool.query<GoogleIntegrationRow>(
    `
    SELECT account_id, connected_email, status, last_error, created_at, updated_at
      FROM google_integrations
     WHERE account_id = $1
     LIMIT 1
    `,
    [accountId]
  );
  return rows[0] ?? null;
}

// Keeps the row for history.
export async function disconnectGoogle(accountId: string) {
  await pool.query(
    `
    UPDATE google_integrations
       SET status = 'disconnected',
           refresh_token_enc = NULL,
           connected_email = NULL,
           updated_at = NOW()
     WHERE account_id = $1
    `,
    [accountId]
  );
}
