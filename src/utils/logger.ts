export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveMinLevel(): LogLevel {
  const raw = String(process.env.LOG_LEVEL || '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').split('.')[0];
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack || data.message;
  }
  return JSON.stringify(data, null, 2);
}

function log(level: LogLevel, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveMinLevel()]) return;

  const levelColors: Record<LogLevel, string> = {
    debug: COLORS.dim,
    info: COLORS.green,
    warn: COLORS.yellow,
    error: COLORS.red,
  };

  const prefix = `${COLORS.dim}[${timestamp()}]${COLORS.reset} ${levelColors[level]}[${level.toUpperCase()}]${COLORS.reset}`;

  console.log(`${prefix} ${message}`);
  if (data !== undefined) {
    console.log(COLORS.dim + formatData(data) + COLORS.reset);
  }
}

export const logger = {
  debug: (msg: string, data?: unknown) => log('debug', msg, data),
  info: (msg: string, data?: unknown) => log('info', msg, data),
  warn: (msg: string, data?: unknown) => log('warn', msg, data),
  error: (msg: string, data?: unknown) => log('error', msg, data),

  step: (step: number, total: number, msg: string) => {
    console.log(`\n${COLORS.magenta}━━━ Step ${step}/${total}: ${msg} ━━━${COLORS.reset}`);
  },

  success: (msg: string) => {
    console.log(`${COLORS.green}✅ ${msg}${COLORS.reset}`);
  },

  waiting: (seconds: number) => {
    console.log(`${COLORS.cyan}⏳ Waiting ${seconds}s before next request...${COLORS.reset}`);
  },
};

/** Logger that drops everything; handy for tests and library callers. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
