import pino from "pino";

// stdout carries the MCP stdio transport, so every log line goes to stderr.
export const logger = pino(
  {
    name: "edge-installer",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  pino.destination(2),
);
