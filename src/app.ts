import { loadConfig, USAGE } from './config.js';
import {
  DatasetExportError,
  EXIT_CODES,
  IOWriteError,
  MalformedRecordError,
  ValidationError,
  errorMessage,
} from './models/errors.js';
import type { ExitCode } from './models/errors.js';
import { runExport } from './services/exporter.js';
import type { ExportOptions } from './services/exporter.js';
import { log } from './utils/log.js';

function reportFailure(err: unknown): ExitCode {
  if (err instanceof ValidationError) {
    log(`Validation failed with ${err.violations.length} violation(s); nothing was written`, 'cli', 'error');
    for (const violation of err.violations) {
      log(`[${violation.code}] ${violation.subject}: ${violation.message}`, 'cli', 'error');
    }
    return err.exitCode;
  }

  if (err instanceof MalformedRecordError) {
    log(`Build failed with ${err.records.length} malformed record(s); nothing was written`, 'cli', 'error');
    for (const { record, issues } of err.records) {
      log(`${record}: ${issues.join('; ')}`, 'cli', 'error');
    }
    return err.exitCode;
  }

  if (err instanceof IOWriteError) {
    log(err.message, 'cli', 'error');
    const written = err.written.length > 0 ? err.written.join(', ') : 'none';
    log(`Files written before the failure: ${written}`, 'cli', 'error');
    return err.exitCode;
  }

  if (err instanceof DatasetExportError) {
    log(err.message, 'cli', 'error');
    return err.exitCode;
  }

  log(`Unexpected failure: ${errorMessage(err)}`, 'cli', 'error');
  return EXIT_CODES.unexpected;
}

/**
 * Run one export from command-line arguments and environment, returning the
 * process exit code. Never throws.
 */
export function runApp(argv: readonly string[], env: NodeJS.ProcessEnv, options: ExportOptions = {}): ExitCode {
  try {
    const { config, help } = loadConfig(argv, env);
    if (help) {
      console.log(USAGE);
      return EXIT_CODES.success;
    }

    runExport(config, options);
    return EXIT_CODES.success;
  } catch (err: unknown) {
    return reportFailure(err);
  }
}
