import env from "./env-vars";

// Server-side log lines: HTTP access logs and render failures. The renderer
// itself never logs. Production drops the timestamp and debug lines.

const isDev = env.NODE_ENV !== "production";

export function format(level: string, dev: boolean, ...args: unknown[]): string {
  const time = new Date().toISOString();
  const processedArgs = args.map((arg) => {
    if (arg instanceof Error) {
      return `${arg.name}: ${arg.message}`;
    }
    if (typeof arg === "object" && arg !== null) {
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    }
    return String(arg);
  });
  const rest = (processedArgs.length ? " " : "") + processedArgs.join(" ");
  return dev ? `[${time}] [${level}]` + rest : `[${level}]` + rest;
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (isDev) console.debug(format("DEBUG", isDev, ...args));
  },
  info: (...args: unknown[]) => {
    console.info(format("INFO", isDev, ...args));
  },
  warn: (...args: unknown[]) => {
    console.warn(format("WARN", isDev, ...args));
  },
  error: (...args: unknown[]) => {
    console.error(format("ERROR", isDev, ...args));
  },
};
