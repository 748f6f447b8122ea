/**
 * Writer
 *
 * Persists rendered files. Each file goes to a temporary sibling first and is
 * renamed into place, so a target is either the old content or the new one.
 * A failure stops the run; files written before it stay in place.
 */
import fs from 'node:fs';
import path from 'node:path';
import { IOWriteError, errorMessage } from '../models/errors.js';
import type { OutputFormat, RenderedFile, ViewName } from '../models/views.js';
import { log } from '../utils/log.js';
import type { Logger } from '../utils/log.js';

export const OUTPUT_FILE_PREFIX = 'owasp_agentic_top10';

export function outputFileName(view: ViewName, format: OutputFormat): string {
  return `${OUTPUT_FILE_PREFIX}_${view}.${format}`;
}

export function ensureWritableDirectory(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.accessSync(dir, fs.constants.W_OK);
  } catch (err: unknown) {
    throw new IOWriteError(dir, `output directory is not writable (${errorMessage(err)})`, [], { cause: err });
  }
}

/** Write one file atomically and return its final path. */
export function writeOutput(dir: string, file: Pick<RenderedFile, 'fileName' | 'content'>): string {
  const target = path.join(dir, file.fileName);
  const temp = `${target}.${process.pid}.tmp`;

  try {
    fs.writeFileSync(temp, file.content, 'utf8');
    fs.renameSync(temp, target);
  } catch (err: unknown) {
    fs.rmSync(temp, { force: true });
    throw new IOWriteError(target, errorMessage(err), [], { cause: err });
  }

  return target;
}

export function writeOutputs(dir: string, files: readonly RenderedFile[], logger: Logger = log): string[] {
  ensureWritableDirectory(dir);

  const written: string[] = [];
  for (const file of files) {
    try {
      written.push(writeOutput(dir, file));
    } catch (err: unknown) {
      if (err instanceof IOWriteError) {
        logger(`Stopped after ${written.length} of ${files.length} files: ${err.message}`, 'writer', 'error');
        throw new IOWriteError(err.path, errorMessage(err.cause), written, { cause: err.cause });
      }
      throw err;
    }
    logger(`Wrote ${file.fileName}`, 'writer');
  }
  return written;
}
