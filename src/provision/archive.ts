/**
 * Archive Extraction
 */

import * as fs from 'fs';
import * as tar from 'tar';
import { InstallError, errorMessage } from './errors.js';

export interface ArchiveExtractor {
  /**
   * Extract a .tar.gz archive into destDir (created if missing)
   *
   * @throws InstallError with kind 'permission' or 'extraction'
   */
  extract(archivePath: string, destDir: string): Promise<void>;
}

const PERMISSION_CODES = ['EACCES', 'EPERM', 'EROFS'];

export function isPermissionError(e: unknown): boolean {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return PERMISSION_CODES.includes(e.code);
  }
  const message = errorMessage(e);
  return PERMISSION_CODES.some((code) => message.includes(code));
}

export class TarExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      await tar.extract({
        file: archivePath,
        cwd: destDir,
        strict: true,
      });
    } catch (e) {
      const message = errorMessage(e);
      if (isPermissionError(e)) {
        throw new InstallError('permission', 'Permission denied extracting to ' + destDir + ': ' + message);
      }
      throw new InstallError('extraction', 'Failed to extract ' + archivePath + ': ' + message);
    }
  }
}
