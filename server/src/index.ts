import { serve } from "@hono/node-server";
import app from "./app";
import env from "./utils/env-vars";
import { logger } from "./utils/logger";

serve({ fetch: app.fetch, port: env.APP_PORT }, (info) => {
  logger.info(`Receipt writer listening on port ${info.port}`);
});
