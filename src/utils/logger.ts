/**
 * Logger utility using Pino
 */
import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

function createRootLogger(): pino.Logger {
  // Pretty output only for interactive terminals; pipes and CI get JSON lines
  if (process.stdout.isTTY && level !== 'silent') {
    try {
      const transport = pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      });
      return pino({ level }, transport);
    } catch {
      // pino-pretty not resolvable, fall through to JSON output
    }
  }
  return pino({ level });
}

const rootLogger = createRootLogger();

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return rootLogger.child({ name });
}

export { rootLogger as logger };
