import winston from "winston";
import config from "../config/env";

const { combine, timestamp, printf, colorize } = winston.format;

// Errors have no enumerable fields, so JSON.stringify would render them as {}.
const serializeMeta = (_key: string, value: unknown): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  return value;
};

const logFormat = printf(({ level, message, timestamp, ...meta }) => {
  return `${timestamp} ${level}: ${message} ${
    Object.keys(meta).length ? JSON.stringify(meta, serializeMeta) : ""
  }`;
});

const consoleTransport = () =>
  new winston.transports.Console({
    format: combine(colorize(), timestamp(), logFormat),
  });

const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(timestamp(), logFormat),
  transports: [consoleTransport()],
});

logger.exceptions.handle(consoleTransport());
logger.rejections.handle(consoleTransport());

export default logger;
