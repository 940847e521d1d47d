import { mkdirSync, renameSync, unlinkSync, writeFileSync, existsSync } from 'node:fs';
import { dirname, basename, join } from 'node:path';
import { DestinationWriteError } from './errors.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'resume:output' });

let tempCounter = 0;

function tempPathFor(path: string): string {
  tempCounter += 1;
  return join(dirname(path), `.${basename(path)}.${process.pid}.${tempCounter}.tmp`);
}

/**
 * Write bytes to `path` through a sibling temporary file and a rename, so a
 * reader never sees a partly written document.
 */
export function writeOutputAtomic(path: string, bytes: Uint8Array): void {
  const tempPath = tempPathFor(path);
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(tempPath, bytes);
    renameSync(tempPath, path);
  } catch (err) {
    if (existsSync(tempPath)) {
      try {
        unlinkSync(tempPath);
      } catch (cleanupErr) {
        log.warn({ err: cleanupErr, tempPath }, 'Could not remove temporary output file');
      }
    }
    log.error({ err, path }, 'Failed to write rendered output');
    throw new DestinationWriteError(path, err);
  }
  log.info({ path, bytes: bytes.length }, 'Rendered output written');
}
