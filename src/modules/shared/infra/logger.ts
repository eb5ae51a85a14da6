import { pino } from "pino";
import { config } from "./config.js";

export type Logger = typeof logger;
export const logger = pino({
  level: config.LOG_LEVEL,
  ...(config.NODE_ENV === "production"
    ? {}
    : {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
          },
        },
      }),
});
