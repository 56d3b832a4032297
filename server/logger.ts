import 'dotenv/config';
import pino from 'pino';

const logger: pino.Logger = pino({
  name: 'market-sync',
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// Route console output through pino so the `[component] message` lines written
// by every module become structured JSON.
function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

export function routeConsoleToLogger(target: pino.Logger = logger): void {
  console.log = (...args: unknown[]) => target.info(formatArgs(args));
  console.error = (...args: unknown[]) => target.error(formatArgs(args));
  console.warn = (...args: unknown[]) => target.warn(formatArgs(args));
  console.info = (...args: unknown[]) => target.info(formatArgs(args));
  console.debug = (...args: unknown[]) => target.debug(formatArgs(args));
}

routeConsoleToLogger();

export default logger;
