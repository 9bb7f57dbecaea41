import pino, { type Logger } from "pino";

export type { Logger };

export function createLogger(opts?: {
  name?: string;
  level?: string;
  stderr?: boolean;
  destination?: pino.DestinationStream;
}): Logger {
  const level = opts?.level ?? process.env.LOG_LEVEL ?? "info";
  const name = opts?.name ?? "vidx";
  if (opts?.destination) return pino({ name, level }, opts.destination);
  // CLI output goes to stdout; keep logs off it.
  if (opts?.stderr) return pino({ name, level }, pino.destination(2));
  return pino({ name, level });
}

export const logger: Logger = createLogger();
