import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { describeError, WriteError } from '../core/errors.js';
import { log } from '../core/logger.js';

/** One file to be written under the output directory. */
export interface Artifact {
  fileName: string;
  content: string | Uint8Array;
}

/**
 * Write artifacts in order, creating `outDir` and its parents and overwriting
 * existing files. Returns the written paths. Any filesystem failure becomes a
 * `WriteError` naming the path that could not be written.
 */
export async function writeArtifacts(outDir: string, artifacts: readonly Artifact[]): Promise<string[]> {
  try {
    await mkdir(outDir, { recursive: true });
  } catch (error) {
    throw new WriteError(outDir, describeError(error));
  }

  const written: string[] = [];
  for (const artifact of artifacts) {
    const filePath = path.join(outDir, artifact.fileName);
    try {
      if (typeof artifact.content === 'string') {
        await writeFile(filePath, artifact.content, 'utf8');
      } else {
        await writeFile(filePath, artifact.content);
      }
    } catch (error) {
      log.output.error({ path: filePath, error: describeError(error) }, 'write failed');
      throw new WriteError(filePath, describeError(error));
    }
    written.push(filePath);
  }

  log.output.info({ outDir, files: written.length }, 'artifacts written');
  return written;
}
