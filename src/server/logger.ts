import winston from "winston";

export type { Logger } from "winston";

export function createLogger(level: string): winston.Logger {
  return winston.createLogger({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp(),
      winston.format.printf(
        (info) => `${info.timestamp} - ${info.level}: ${info.message}`
      )
    ),
    transports: [
      new winston.transports.Console({
        level,
      }),
    ],
  });
}

export function createSilentLogger(): winston.Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  });
}
