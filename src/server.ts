// src/server.ts
import * as path from "path";
import dotenv from "dotenv";

if (process.env.NODE_ENV !== "production") {
  dotenv.config({ path: path.resolve(__dirname, "../.env.local") });
}

import { createApp } from "./app";
import { getSettings, isGoogleConfigured } from "./config/settings";
import * as logger from "./lib/logger";

const settings = getSettings();
const app = createApp(undefined, settings);

logger.info(
  isGoogleConfigured(settings)
    ? "🗓️ Google integration configured: calendar slots with file fallback"
    : `🗂️ Google not configured: offering slots from ${settings.slotsFile}`
);

app.listen(settings.port, () => {
  logger.info(`🚀 Server running at http://localhost:${settings.port}`);
});
