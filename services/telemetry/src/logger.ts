import pino, { stdTimeFunctions, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerSettings {
  level: LevelWithSilent;
  name?: string;
}

export function createLogger(settings: LoggerSettings): Logger {
  return pino({
    name: settings.name ?? 'telemetry',
    level: settings.level,
    base: null,
    timestamp: stdTimeFunctions.isoTime
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
