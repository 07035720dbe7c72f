type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// LOG_LEVEL は呼び出しのたびに読む
function currentLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  switch (raw) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return raw;
    default:
      return 'info';
  }
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

export const logger = {
  debug: (msg: string, data?: unknown) => {
    if (!enabled('debug')) return;
    console.debug(`[DEBUG] ${msg}`, JSON.stringify(data ?? {}, null, 2));
  },
  info: (msg: string, data?: unknown) => {
    if (!enabled('info')) return;
    console.log(`[INFO] ${msg}`, JSON.stringify(data ?? {}, null, 2));
  },
  warn: (msg: string, data?: unknown) => {
    if (!enabled('warn')) return;
    console.warn(`[WARN] ${msg}`, JSON.stringify(data ?? {}, null, 2));
  },
  error: (msg: string, error: unknown) => {
    if (!enabled('error')) return;
    const payload =
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : error;
    console.error(`[ERROR] ${msg}`, JSON.stringify(payload ?? {}, null, 2));
  },
};
