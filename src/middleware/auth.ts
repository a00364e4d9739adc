// src/middleware/auth.ts
import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import { getSettings } from "../config/settings";
import * as logger from "../lib/logger";

function bearerToken(req: Request): string | undefined {
  const rawAuth = req.headers?.authorization ?? "";
  return rawAuth.toLowerCase().startsWith("bearer ") ? rawAuth.slice(7).trim() : undefined;
}

/** Admin-only routes: a bearer JWT signed with ADMIN_JWT_SECRET and carrying role "admin". */
export function requireAdmin(req: Request, res: Response, next: NextFunction) {
  if (req.method === "OPTIONS") return res.sendStatus(204);

  const secret = getSettings().adminJwtSecret;
  if (!secret) {
    logger.error("❌ [AUTH] ADMIN_JWT_SECRET not set");
    return res.status(503).json({ error: "admin_auth_not_configured" });
  }

  const token = bearerToken(req);
  if (!token) {
    logger.warn("⚠️ [AUTH] missing token:", req.method, req.originalUrl);
    return res.status(401).json({ error: "token_required" });
  }

  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === "string" || decoded.role !== "admin" || typeof decoded.sub !== "string") {
      return res.status(403).json({ error: "forbidden" });
    }

    req.admin = {
      sub: decoded.sub,
      email: typeof decoded.email === "string" ? decoded.email : undefined,
    };
    logger.debug("👤 [AUTH] admin", req.admin.sub);
    return next();
  } catch (err) {
    logger.warn("⚠️ [AUTH] invalid token:", err instanceof Error ? err.message : err);
    return res.status(403).json({ error: "invalid_token" });
  }
}
