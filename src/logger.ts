import pino from "pino";

// Logs go to stderr; stdout carries command output only.
export const logger = pino(
  {
    name: "pam-manager",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
