import pino from 'pino';

const PII_PATTERNS = new Set([
  'password',
  'newpassword',
  'passwordhash',
  'digest',
  'token',
  'accesstoken',
  'refreshtoken',
  'secret',
  'tokensecret',
  'tokenkeys',
  'signingkey',
  'login',
  'email',
  'ip',
  'ipaddress',
  'remoteaddress',
  'authorization',
  'cookie',
  'body',
]);

// refresh_token, refreshToken and Refresh-Token all normalise to refreshtoken
function isPiiKey(key: string): boolean {
  return PII_PATTERNS.has(key.toLowerCase().replace(/[_-]/g, ''));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export function sanitize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isPiiKey(key)) {
      result[key] = '[REDACTED]';
    } else if (value instanceof Error) {
      result[key] = { name: value.name, message: value.message };
    } else if (isPlainObject(value)) {
      result[key] = sanitize(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item: unknown) => (isPlainObject(item) ? sanitize(item) : item));
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta: Record<string, unknown>, msg: string) {
      logger.info(sanitize(meta), msg);
    },
    warn(meta: Record<string, unknown>, msg: string) {
      logger.warn(sanitize(meta), msg);
    },
    error(meta: Record<string, unknown>, msg: string) {
      logger.error(sanitize(meta), msg);
    },
    debug(meta: Record<string, unknown>, msg: string) {
      logger.debug(sanitize(meta), msg);
    },
    fatal(meta: Record<string, unknown>, msg: string) {
      logger.fatal(sanitize(meta), msg);
    },
    child(bindings: Record<string, unknown>): SafeLogger {
      return wrapPino(logger.child(sanitize(bindings)));
    },
  };
}

// Loggers created without an explicit level; setLogLevel moves them all.
const followers = new Set<pino.Logger>();
let configuredLevel: string | undefined;

/**
 * Applies the resolved config level to every logger that did not pin its
 * own, including those created at module load. Children made earlier keep
 * the level they were created with.
 */
export function setLogLevel(level: string): void {
  configuredLevel = level;
  for (const instance of followers) instance.level = level;
}

export function createLogger(opts: {
  name: string;
  level?: string;
  destination?: pino.DestinationStream;
}): SafeLogger {
  const options: pino.LoggerOptions = {
    name: opts.name,
    level: opts.level ?? configuredLevel ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  const pinoInstance = opts.destination ? pino(options, opts.destination) : pino(options);
  if (opts.level === undefined) followers.add(pinoInstance);
  return wrapPino(pinoInstance);
}
