import pino from 'pino';
import { LoggingConfig, loadLoggingConfig } from './config';

export function buildRootLogger({ logLevel, logFile }: LoggingConfig): pino.Logger {
  if (logFile) {
    return pino({ level: logLevel }, pino.destination({ dest: logFile, mkdir: true }));
  }
  if (process.env.NODE_ENV === 'development') {
    return pino({ level: logLevel, transport: { target: 'pino-pretty' } });
  }
  return pino({ level: logLevel });
}

const rootLogger = buildRootLogger(loadLoggingConfig());

export function createLogger(module: string): pino.Logger {
  return rootLogger.child({ module });
}

export default rootLogger;
