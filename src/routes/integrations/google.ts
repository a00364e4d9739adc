// src/routes/integrations/google.ts
// Connects the advisor's Google account (calendar + ledger sheet).
import crypto from "crypto";
import { Router, type Request, type Response } from "express";
import { getSettings } from "../../config/settings";
import { isObject } from "../../lib/json";
import * as logger from "../../lib/logger";
import { requireAdmin } from "../../middleware/auth";
import {
  GOOGLE_SCOPES,
  disconnectGoogle,
  exchangeAuthCode,
  fetchConnectedEmail,
  getGoogleIntegration,
  saveGoogleIntegration,
} from "../../services/googleAuth";

const STATE_TTL_MS = 10 * 60 * 1000;

function stateSecret() {
  const secret = getSettings().google.stateSecret;
  if (!secret) throw new Error("google_state_secret_missing");
  return secret;
}

export function signState(payload: { accountId: string; t: number }) {
  const raw = Buffer.from(JSON.stringify(payload)).toString("base64url");
  const sig = crypto.createHmac("sha256", stateSecret()).update(raw).digest("base64url");
  return `${raw}.${sig}`;
}

export function verifyState(state: string, now: number = Date.now()): { accountId: string; t: number } {
  const [raw, sig] = state.split(".");
  if (!raw || !sig) throw new Error("invalid_state");

  const expected = crypto.createHmac("sha256", stateSecret()).update(raw).digest("base64url");
  const a = Buffer.from(sig);
  const b = Buffer.from(expected);
  if (a.length !== b.length || !crypto.timingSafeEqual(a, b)) throw new Error("invalid_state");

  const decoded: unknown = JSON.parse(Buffer.from(raw, "base64url").toString("utf8"));
  if (!isObject(decoded) || typeof decoded.accountId !== "string" || typeof decoded.t !== "number") {
    throw new Error("invalid_state");
  }
  if (now - decoded.t > STATE_TTL_MS) throw new Error("state_expired");
  return { accountId: decoded.accountId, t: decoded.t };
}

const router = Router();

/**
 * GET /api/integrations/google/status
 * Connection state, never tokens.
 */
router.get("/status", requireAdmin, async (_req: Request, res: Response) => {
  try {
    const { accountId, calendarId, sheetId } = getSettings().google;
    const r = await getGoogleIntegration(accountId);

    return res.json({
      connected: !!r && r.status === "connected",
      connected_email: r?.connected_email || null,
      integration_status: r?.status || "none",
      last_error: r?.last_error || null,
      calendar_id: calendarId,
      sheet_configured: !!sheetId,
      updated_at: r?.updated_at || null,
    });
  } catch (e) {
    logger.error("❌ [GOOGLE] status error:", e);
    return res.status(500).json({ error: "internal" });
  }
});

router.get("/connect", requireAdmin, (_req: Request, res: Response) => {
  try {
    const { clientId, redirectUrl, accountId } = getSettings().google;
    if (!clientId || !redirectUrl) {
      return res.status(500).json({ error: "google_oauth_not_configured" });
    }

    const params = new URLSearchParams({
      client_id: clientId,
      redirect_uri: redirectUrl,
      response_type: "code",
      scope: GOOGLE_SCOPES.join(" "),
      access_type: "offline",
      prompt: "consent",
      include_granted_scopes: "true",
      state: signState({ accountId, t: Date.now() }),
    });

    return res.redirect(`https://accounts.google.com/o/oauth2/v2/auth?${params.toString()}`);
  } catch (e) {
    logger.error("❌ [GOOGLE] connect error:", e);
    return res.status(500).json({ error: "internal" });
  }
});

// Google redirects here; the signed state stands in for the admin token.
router.get("/callback", async (req: Request, res: Response) => {
  const code = typeof req.query.code === "string" ? req.query.code : "";
  const state = typeof req.query.state === "string" ? req.query.state : "";
  if (!code || !state) return res.status(400).send("Missing code/state");

  let accountId: string;
  try {
    accountId = verifyState(state).accountId;
  } catch (e) {
    logger.warn("⚠️ [GOOGLE] bad state:", e instanceof Error ? e.message : e);
    return res.status(400).send("Invalid state");
  }

  try {
    const { refreshToken, accessToken } = await exchangeAuthCode(code);
    if (!refreshToken) {
      return res.status(400).send("No refresh_token returned. Revoke access and try again.");
    }

    const email = accessToken ? await fetchConnectedEmail(accessToken) : null;
    await saveGoogleIntegration(accountId, refreshToken, email);

    logger.info("✅ [GOOGLE] connected", accountId, email || "");
    return res.send("Google account connected. You can close this window.");
  } catch (e) {
    logger.error("❌ [GOOGLE] callback error:", e);
    return res.status(500).send("Internal error");
  }
});

router.post("/disconnect", requireAdmin, async (_req: Request, res: Response) => {
  try {
    await disconnectGoogle(getSettings().google.accountId);
    return res.json({ ok: true, connected: false });
  } catch (e) {
    logger.error("❌ [GOOGLE] disconnect error:", e);
    return res.status(500).json({ ok: false, error: "internal_error" });
  }
});

export default router;
