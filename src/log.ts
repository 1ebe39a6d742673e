import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

let current: LogLevel = parseLevel(process.env.ISSUEDEX_LOG_LEVEL) ?? "info";

function parseLevel(value: string | undefined): LogLevel | undefined {
  if (value === "debug" || value === "info" || value === "warn" || value === "error" || value === "silent") {
    return value;
  }
  return undefined;
}

function enabled(level: LogLevel): boolean {
  return ORDER[level] >= ORDER[current];
}

// stdout is reserved for command output and the MCP stdio transport
function write(line: string): void {
  process.stderr.write(`${line}\n`);
}

export const log = {
  setLevel(level: LogLevel): void {
    current = level;
  },
  debug(message: string): void {
    if (enabled("debug")) write(chalk.dim(`debug ${message}`));
  },
  info(message: string): void {
    if (enabled("info")) write(message);
  },
  warn(message: string): void {
    if (enabled("warn")) write(chalk.yellow(`warning: ${message}`));
  },
  error(message: string): void {
    if (enabled("error")) write(chalk.red(`error: ${message}`));
  },
};
