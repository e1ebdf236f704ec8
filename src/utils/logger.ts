/**
 * Logger utility using Pino
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

// Pretty output only for interactive terminals; pipes and tests get JSON lines
const usePretty = Boolean(process.stdout.isTTY) && !process.env.VITEST && level !== 'silent';

const terminal: pino.DestinationStream = usePretty
  ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    })
  : pino.destination({ dest: 1, sync: true });

// Optional JSON log file next to the console output, switched by setLogFile
let logFile: ReturnType<typeof pino.destination> | null = null;
const fileStream: pino.DestinationStream = {
  write(msg: string) {
    if (logFile) logFile.write(msg);
  },
};

const rootLogger = pino(
  { level },
  pino.multistream([
    { level: 'trace', stream: terminal },
    { level: 'trace', stream: fileStream },
  ]),
);

export type Logger = pino.Logger;

// Children keep their own level once created, so track them for setLogLevel
const children = new Set<Logger>();

export function createLogger(name: string): Logger {
  const child = rootLogger.child({ name });
  children.add(child);
  return child;
}

/** Change the level of the root logger and every module logger. */
export function setLogLevel(next: string): void {
  rootLogger.level = next;
  for (const child of children) {
    child.level = next;
  }
}

/**
 * Also append every log line to `path` (parent directories are created).
 * Passing null closes the current file.
 */
export function setLogFile(path: string | null): void {
  if (logFile) {
    logFile.flushSync();
    logFile.end();
  }
  logFile = path ? pino.destination({ dest: path, mkdir: true, sync: true }) : null;
}

export { rootLogger as logger };
