/* Lightweight structured logger with step timing */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';
export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(v: string | undefined): v is LogLevel {
  return v !== undefined && v in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
let format: LogFormat = process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json';

export function setLogLevel(l: LogLevel) {
  currentLevel = l;
}

export function setLogFormat(f: LogFormat) {
  format = f;
}

function ts() {
  return new Date().toISOString();
}

export interface StepTimer {
  end: (extra?: LogMeta) => void;
}

function color(level: LogLevel, s: string) {
  if (format !== 'pretty') return s;
  const map: Record<LogLevel, string> = {
    debug: '\u001b[90m',
    info: '\u001b[36m',
    warn: '\u001b[33m',
    error: '\u001b[31m',
  };
  const reset = '\u001b[0m';
  return map[level] + s + reset;
}

let logFileFd: number | null = null;

export function setLogFile(filePath: string) {
  try {
    closeLogFile();
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    logFileFd = fs.openSync(filePath, 'a');
  } catch (e) {
    // eslint-disable-next-line no-console
    console.error('Failed to open log file', filePath, e);
  }
}

export function closeLogFile() {
  if (logFileFd !== null) {
    fs.closeSync(logFileFd);
    logFileFd = null;
  }
}

export function log(level: LogLevel, msg: string, meta: LogMeta = {}) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  const payload = { t: ts(), level, msg, ...meta };
  const line = JSON.stringify(payload);
  if (format === 'json') {
    // eslint-disable-next-line no-console
    console.log(line);
  } else {
    const metaStr = Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
    // eslint-disable-next-line no-console
    console.log(color(level, `${payload.t} ${level.toUpperCase()} ${msg}`) + metaStr);
  }
  if (logFileFd !== null) {
    fs.writeSync(logFileFd, line + '\n');
  }
}

export function debug(msg: string, meta?: LogMeta) {
  log('debug', msg, meta);
}
export function info(msg: string, meta?: LogMeta) {
  log('info', msg, meta);
}
export function warn(msg: string, meta?: LogMeta) {
  log('warn', msg, meta);
}
export function error(msg: string, meta?: LogMeta) {
  log('error', msg, meta);
}

export function startStep(name: string, meta: LogMeta = {}): StepTimer {
  const start = performance.now();
  info(`start:${name}`, meta);
  return {
    end: (extra: LogMeta = {}) => {
      const durMs = performance.now() - start;
      info(`end:${name}`, { ms: Math.round(durMs), ...meta, ...extra });
    },
  };
}
