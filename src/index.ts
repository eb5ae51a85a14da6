import { serve } from "@hono/node-server";
import { Hono } from "hono";
import {
  createCartHttpAdapter,
  createCartModule,
} from "./modules/cart/cart.index.js";
import { config } from "./modules/shared/infra/config.js";
import { getDb } from "./modules/shared/infra/db.js";
import { logger } from "./modules/shared/infra/logger.js";

const app = new Hono();
const db = getDb();

app.get("/health", (c) => {
  return c.json({ status: "ok" });
});

const cartPort = createCartModule({ db, logger });
app.route("", createCartHttpAdapter({ cartPort, logger }));

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
  },
  (info) => {
    logger.info(`Server is running on http://localhost:${info.port}`);
  },
);

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    logger.info({ signal }, "shutting down");
    server.close(() => {
      db.destroy().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ error }, "failed to close database pool");
          process.exit(1);
        },
      );
    });
  });
}
