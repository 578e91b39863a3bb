import chalk from "chalk";

type LogLevel = "debug" | "success" | "info" | "warn" | "error";

interface LogOptions {
  scope?: string;
  data?: unknown;
}

interface Logger {
  debug: (message: string, options?: LogOptions) => void;
  success: (message: string, options?: LogOptions) => void;
  info: (message: string, options?: LogOptions) => void;
  warn: (message: string, options?: LogOptions) => void;
  error: (message: string, options?: LogOptions) => void;
}

interface LoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

const formatData = (data: unknown): string => {
  if (data === undefined) {
    return "";
  }
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  if (typeof data === "string") {
    return data;
  }
  if (typeof data === "number" || typeof data === "boolean") {
    return String(data);
  }
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return "Unable to serialize log data.";
  }
};

const formatScope = (options?: LogOptions) =>
  options?.scope ? ` ${chalk.gray(`[${options.scope}]`)}` : "";

const withData = (base: string, options?: LogOptions) => {
  const data = formatData(options?.data);
  if (data.length === 0) {
    return base;
  }
  return `${base}\n${data}`;
};

const formatLine = (
  label: string,
  color: (value: string) => string,
  message: string,
  options?: LogOptions
) => {
  const timestamp = new Date().toLocaleString();
  return withData(
    `${chalk.gray(timestamp)} ${color(label)}${formatScope(options)} ${message}`,
    options
  );
};

const formatInfoLine = (message: string, options?: LogOptions) => {
  const timestamp = new Date().toLocaleString();
  return withData(
    `${chalk.gray(timestamp)}${formatScope(options)} ${message}`,
    options
  );
};

const formatWarnLine = (message: string, options?: LogOptions) => {
  const timestamp = new Date().toLocaleString();
  const scope = options?.scope ? ` [${options.scope}]` : "";
  const data = formatData(options?.data);
  const base = `${chalk.gray(timestamp)} ${chalk.yellowBright(
    `⚠${scope} ${message}`
  )}`;
  if (data.length === 0) {
    return base;
  }
  return `${base}\n${chalk.yellowBright(data)}`;
};

const formatEntry = (level: LogLevel, message: string, options?: LogOptions) => {
  if (level === "debug") {
    return formatLine("DEBUG", chalk.cyan, message, options);
  }
  if (level === "success") {
    return formatLine("SUCCESS", chalk.greenBright, message, options);
  }
  if (level === "info") {
    return formatInfoLine(message, options);
  }
  if (level === "warn") {
    return formatWarnLine(message, options);
  }
  return formatLine("ERROR", chalk.redBright, message, options);
};

// stdout carries the workflow answer only; every log line goes to stderr.
const writeToStderr = (line: string) => {
  process.stderr.write(`${line}\n`);
};

const createLogger = (options: LoggerOptions = {}): Logger => {
  const verbose = options.verbose ?? false;
  const write = options.write ?? writeToStderr;

  const writeLog = (level: LogLevel, message: string, logOptions?: LogOptions) => {
    if (level === "debug" && !verbose) {
      return;
    }
    write(formatEntry(level, message, logOptions));
  };

  return {
    debug: (message, logOptions) => writeLog("debug", message, logOptions),
    success: (message, logOptions) => writeLog("success", message, logOptions),
    info: (message, logOptions) => writeLog("info", message, logOptions),
    warn: (message, logOptions) => writeLog("warn", message, logOptions),
    error: (message, logOptions) => writeLog("error", message, logOptions),
  };
};

const logger = createLogger();

export { createLogger, logger };
export type { LogOptions, Logger, LoggerOptions };
