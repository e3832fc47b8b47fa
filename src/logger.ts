import pino from "pino";

const pretty = ["1", "true", "yes", "on"].includes(
  (process.env.LOG_PRETTY ?? "").toLowerCase(),
);

const options: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "clipdrop-bot" },
  ...(pretty
    ? {
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss" },
        },
      }
    : {}),
};

export const logger = pino(options);
