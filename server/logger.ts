type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: readonly Level[] = ['debug', 'info', 'warn', 'error', 'silent'];

const order: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

function resolveLevel(raw: string | undefined): Level {
  const value = (raw || (process.env.NODE_ENV === 'production' ? 'warn' : 'info')).toLowerCase();
  return LEVELS.find((level) => level === value) ?? 'info';
}

const envLevel = resolveLevel(process.env.LOG_LEVEL);

function shouldLog(level: Level) {
  return order[level] >= order[envLevel];
}

function format(level: string, msg: unknown, source?: string) {
  const time = new Date().toISOString();
  const text = msg instanceof Error ? msg.message : String(msg);
  return `[${time}]${source ? ` [${source}]` : ''} ${level.toUpperCase()}: ${text}`;
}

export const logger = {
  debug: (msg: unknown, source?: string) => {
    if (shouldLog('debug')) console.debug(format('debug', msg, source));
  },
  info: (msg: unknown, source?: string) => {
    if (shouldLog('info')) console.info(format('info', msg, source));
  },
  warn: (msg: unknown, source?: string) => {
    if (shouldLog('warn')) console.warn(format('warn', msg, source));
  },
  error: (msg: unknown, source?: string) => {
    if (shouldLog('error')) console.error(format('error', msg, source));
  }
};
