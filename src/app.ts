// src/app.ts
import express from "express";
import cors, { type CorsOptions } from "cors";
import { getSettings, type Settings } from "./config/settings";
import * as logger from "./lib/logger";
import { isObject } from "./lib/json";
import { createBookingActions, type BookingActions } from "./lib/advisor/actions";
import { createCodeGenerator, createDefaultIntegrations } from "./lib/advisor/integrations";
import { ConversationSession } from "./lib/advisor/session";
import { SessionStore } from "./lib/advisor/sessionStore";
import { createDefaultSlotSource } from "./lib/advisor/slotSources";
import { createAdvisorRouter } from "./routes/advisor";
import googleIntegrationRoutes from "./routes/integrations/google";
import { createVoiceRouter } from "./routes/webhook/voice";

export type AppDeps = {
  sessions: SessionStore;
  actions: BookingActions | null;
};

export function createDefaultDeps(settings: Settings = getSettings()): AppDeps {
  const integrations = createDefaultIntegrations(settings);
  const slotSource = createDefaultSlotSource(settings);
  const generateBookingCode = createCodeGenerator(settings, integrations.ledger);

  const sessions = new SessionStore(
    () =>
      new ConversationSession({
        slotSource,
        timezoneLabel: settings.timezoneLabel,
        referenceYear: settings.dateReferenceYear,
        bookingCodePrefix: settings.bookingCodePrefix,
        generateBookingCode,
        availability: settings.availability,
      }),
    settings.sessionTtlMin * 60 * 1000
  );

  return { sessions, actions: createBookingActions(integrations) };
}

function errorStatus(err: unknown): number {
  if (isObject(err) && typeof err.status === "number") return err.status;
  return 500;
}

export function createApp(deps: AppDeps = createDefaultDeps(), settings: Settings = getSettings()) {
  const app = express();
  app.set("trust proxy", 1);

  // —— CORS ————————————————————————————————————————
  const WHITELIST = [...settings.corsOrigins, "http://localhost:3000"];

  const corsOptions: CorsOptions = {
    origin(origin, cb) {
      if (!origin || WHITELIST.includes(origin)) return cb(null, true);
      return cb(new Error(`Not allowed by CORS: ${origin}`));
    },
    credentials: true,
    methods: ["GET", "HEAD", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "Accept", "Origin"],
    maxAge: 86400,
  };

  app.use((_req, res, next) => {
    res.setHeader("Vary", "Origin");
    next();
  });
  app.use(cors(corsOptions));
  app.options("*", cors(corsOptions));

  // —— Parsers (Twilio posts urlencoded) ————————————
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true, at: new Date().toISOString() });
  });

  // —— Routes ——————————————————————————————————————
  app.use("/api/advisor", createAdvisorRouter(deps));
  app.use("/webhook/voice", createVoiceRouter(deps));
  app.use("/api/integrations/google", googleIntegrationRoutes);

  app.get("/", (_req, res) => {
    res.send("Advisor appointment backend 🟢");
  });

  // —— Error handler ———————————————————————————————
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const origin = req.headers.origin;
    if (origin && WHITELIST.includes(origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Access-Control-Allow-Credentials", "true");
    }
    const status = errorStatus(err);
    const message = err instanceof Error ? err.message : "Internal Server Error";
    logger.error("❌ Error handler:", status, message, "→", req.originalUrl);
    res.status(status).json({ ok: false, error: message, path: req.originalUrl });
  });

  return app;
}
