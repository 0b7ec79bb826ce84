import { readLoggingConfig } from '../pipeline/env';
import { PipelineError, RunInterruptedError } from '../pipeline/errors';
import { setLogFile, setLogFormat, setLogLevel } from '../pipeline/log';

export function applyLogging(overrides: { level?: string } = {}) {
  const cfg = readLoggingConfig({ ...process.env, ...(overrides.level ? { LOG_LEVEL: overrides.level } : {}) });
  setLogLevel(cfg.level);
  setLogFormat(cfg.format);
  if (cfg.file) setLogFile(cfg.file);
}

export function exitWithError(e: unknown): never {
  if (e instanceof RunInterruptedError) {
    console.error(`⚠️ ${e.message}`);
    process.exit(e.exitCode);
  }
  if (e instanceof PipelineError) {
    console.error(`❌ ${e.toString()}`);
  } else {
    console.error(e);
  }
  process.exit(1);
}
