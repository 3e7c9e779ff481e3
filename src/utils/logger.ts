import axios from 'axios';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown> | undefined;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (value instanceof Set) {
    return Array.from(value);
  }
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.parse(
      JSON.stringify(value, (_key, val: unknown) => {
        if (val instanceof Error) {
          return { name: val.name, message: val.message, stack: val.stack };
        }
        return val;
      })
    );
  }
  return value;
}

function serializeMeta(meta: LogMeta) {
  if (!meta) return {};
  const serialized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    serialized[key] = serializeValue(value);
  }
  return serialized;
}

let ingestionWebhook: string | null = null;
let baseMeta: Record<string, unknown> = {};
const envLevel = process.env.LOG_LEVEL ?? '';
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

function emit(level: LogLevel, msg: string, meta?: LogMeta) {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    msg,
    ...baseMeta,
    ...serializeMeta(meta),
  };
  const line = JSON.stringify(entry);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else if (level === 'debug') {
    console.debug(line);
  } else {
    console.log(line);
  }

  if (ingestionWebhook) {
    axios.post(ingestionWebhook, entry, { timeout: 2000 }).catch((error: unknown) => {
      console.warn(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level: 'warn',
          msg: 'log_ingest_failed',
          error: error instanceof Error ? error.message : String(error),
        })
      );
    });
  }
}

export const logger = {
  debug(msg: string, meta?: LogMeta) {
    emit('debug', msg, meta);
  },
  info(msg: string, meta?: LogMeta) {
    emit('info', msg, meta);
  },
  warn(msg: string, meta?: LogMeta) {
    emit('warn', msg, meta);
  },
  error(msg: string, meta?: LogMeta) {
    emit('error', msg, meta);
  },
};

export function setLogLevel(level: string) {
  if (isLogLevel(level)) {
    threshold = level;
  }
}

export function setLogIngestionWebhook(url: string | null) {
  ingestionWebhook = url;
}

export function setLogContext(meta: Record<string, unknown>) {
  baseMeta = { ...meta };
}
