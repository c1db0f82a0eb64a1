import { execFile } from 'node:child_process';
import { resolve } from 'node:path';
import { promisify } from 'node:util';
import type { Logger } from '../logger/logger.js';
import { errorMessage } from '../../core/errors.js';

const execFileAsync = promisify(execFile);

export interface Uploader {
  /**
   * Upload a local file and return its public location. Falls back to the local path
   * when no upload is configured or the upload fails, so nothing is lost.
   */
  upload(filePath: string): Promise<string>;
}

/** Uploader that keeps files local. */
export const localUploader: Uploader = {
  upload: async (filePath) => filePath,
};

/**
 * Runs the configured object-storage script with the file path as its only argument
 * and takes its stdout as the uploaded URL.
 */
export class ScriptUploader implements Uploader {
  private readonly scriptPath: string;

  constructor(
    scriptPath: string,
    private readonly logger: Logger,
    private readonly timeoutMs: number = 60_000,
  ) {
    this.scriptPath = resolve(scriptPath);
  }

  async upload(filePath: string): Promise<string> {
    const absFile = resolve(filePath);
    this.logger.info('upload', `Execute script: ${this.scriptPath}, Argument: ${absFile}`);
    try {
      const { stdout } = await execFileAsync(this.scriptPath, [absFile], {
        timeout: this.timeoutMs,
        encoding: 'utf-8',
      });
      const url = stdout.trim();
      if (!url) {
        this.logger.error('upload', 'Upload script printed nothing, keeping local path');
        return filePath;
      }
      this.logger.info('upload', `Upload script succeed with online path: ${url}`);
      return url;
    } catch (error) {
      this.logger.error('upload', `Upload script failed: ${errorMessage(error)}`);
      return filePath;
    }
  }
}
