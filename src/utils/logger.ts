import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger };

const SECRET_FIELDS = ["password", "totp", "jwtToken", "refreshToken", "feedToken"];

// stdout carries the MCP protocol, so logs go to stderr unless told otherwise.
export function createLogger(
  level: string = process.env.LOG_LEVEL ?? "info",
  destination: DestinationStream = pino.destination(2),
): Logger {
  return pino(
    {
      name: "smartapi-mcp",
      level,
      redact: {
        paths: [...SECRET_FIELDS, ...SECRET_FIELDS.map((field) => `*.${field}`)],
        censor: "[redacted]",
      },
    },
    destination,
  );
}

export const logger = createLogger();
