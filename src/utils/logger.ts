import * as winston from "winston";
import * as path from "node:path";
import { Config } from "../config/index";

function convertJsToTsPath(jsPath: string): string {
  if (jsPath.endsWith(".ts")) {return jsPath;}
  let tsPath = jsPath;
  if (jsPath.endsWith(".js")) {tsPath = jsPath.replace(/\.js$/, ".ts");}
  if (tsPath.includes("/dist/")) {
    tsPath = tsPath.replace(/\/dist\//, "/src/");
  }
  return tsPath;
}

function getCallerInfo() {
  const originalStackTraceLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = 20;
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, getCallerInfo);
  const stackLines = holder.stack?.split("\n").slice(1) || [];
  Error.stackTraceLimit = originalStackTraceLimit;

  for (const line of stackLines) {
    const match = line.match(/\(([^:]+):(\d+):\d+\)/) || line.match(/at\s+([^:]+):(\d+):\d+/);
    if (match) {
      const [, file, lineNumber] = match;
      if (
        file.includes("node_modules/") ||
        file.includes("internal/") ||
        file.includes("node:") ||
        file.includes("/utils/logger")
      ) {
        continue;
      }
      return { file: convertJsToTsPath(file), line: Number.parseInt(lineNumber, 10) };
    }
  }
  return { file: "unknown", line: 0 };
}

const callerPath = winston.format((info) => {
  const caller = getCallerInfo();
  info.logpath = caller.file === "unknown"
    ? "unknown:0"
    : `${path.relative(process.cwd(), caller.file)}:${caller.line}`;
  return info;
});

export interface LogLineParts {
  timestamp?: unknown;
  level: string;
  message: unknown;
  stack?: unknown;
}

/**
 * Flat `<timestamp> <LEVEL>: <message>` line, followed by the stack when the
 * entry carries one.
 */
export function formatLogLine(info: LogLineParts): string {
  const line = `${String(info.timestamp)} ${info.level.toUpperCase()}: ${String(info.message)}`;
  return typeof info.stack === "string" ? `${line}\n${info.stack}` : line;
}

const transportsList: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf((info) => `${String(info.timestamp)} [${String(info.logpath)}] ${info.level}: ${String(info.message)}`),
    ),
  }),
];

if (Config.LOG_FILE) {
  transportsList.push(
    new winston.transports.File({
      filename: path.resolve(process.cwd(), Config.LOG_FILE),
      format: winston.format.printf(formatLogLine),
    }),
  );
}

export const logger = winston.createLogger({
  level: Config.LOG_LEVEL,
  silent: Config.NODE_ENV === "test",
  format: winston.format.combine(
    callerPath(),
    winston.format.timestamp(),
  ),
  transports: transportsList,
});
