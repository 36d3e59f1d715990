import winston from "winston";

const LOG_FILE = process.env.ARCHIVE_LOG_FILE;

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (LOG_FILE) {
  transports.push(new winston.transports.File({ filename: LOG_FILE }));
}

export const logger = winston.createLogger({
  level: process.env.ARCHIVE_LOG_LEVEL ?? "info",
  silent: process.env.NODE_ENV === "test",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export type Logger = winston.Logger;
