/**
 * The directory submitted code is written into.
 *
 * Every path handed out is produced by joining a filename onto the root and
 * then checking that the result is still strictly below the root. The
 * directory is shared and unsynchronized: two requests using the same
 * filename write to the same file.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import { InvalidFilenameError } from '../validation/errors.js';

export class Workspace {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Absolute path of `filename` inside the workspace.
   * Throws InvalidFilenameError when the name is not a bare file name.
   */
  resolve(filename: string): string {
    if (filename.includes('\0')) {
      throw new InvalidFilenameError(filename, 'contains a NUL byte');
    }
    if (filename.includes('/') || filename.includes('\\')) {
      throw new InvalidFilenameError(filename, 'directory separators are not allowed');
    }
    if (filename.includes('..')) {
      throw new InvalidFilenameError(filename, 'parent directory references are not allowed');
    }

    const candidate = resolve(this.root, filename);
    const rel = relative(this.root, candidate);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new InvalidFilenameError(filename, 'path escapes the workspace');
    }
    return candidate;
  }

  async ensure(): Promise<void> {
    await mkdir(this.root, { recursive: true });
  }

  /** Write `content` verbatim, replacing any file of the same name. */
  async write(filename: string, content: string): Promise<string> {
    const full = this.resolve(filename);
    await this.ensure();
    await writeFile(full, content, 'utf-8');
    return full;
  }

  /** Delete a file; a file that is already gone is fine. */
  async remove(filename: string): Promise<void> {
    await rm(this.resolve(filename), { force: true });
  }
}
