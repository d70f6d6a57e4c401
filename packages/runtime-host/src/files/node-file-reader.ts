/**
 * Strata Runtime Host: Local File Reader
 *
 * Implements FileReader from @strata/kernel for `fn::readFile`. Paths are
 * resolved against the project root. Unless `confine` is switched off, the
 * path is resolved with realpath() (eliminating symlinks) and must then lie
 * inside the real project root.
 */

import { readFile, realpath } from 'node:fs/promises';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import type { FileReader } from '@strata/kernel';

export interface NodeFileReaderOptions {
  /** Refuse paths that resolve outside the project root. Default: true. */
  readonly confine?: boolean;
}

export class NodeFileReader implements FileReader {
  private readonly confine: boolean;

  constructor(
    private readonly rootDirectory: string,
    options: NodeFileReaderOptions = {},
  ) {
    this.confine = options.confine ?? true;
  }

  async readFile(path: string): Promise<string> {
    if (path.includes('\0')) {
      throw new Error(`invalid path: null byte in ${JSON.stringify(path)}`);
    }
    const target = resolve(this.rootDirectory, path);
    if (!this.confine) return readFile(target, 'utf-8');

    const [root, real] = await Promise.all([realpath(this.rootDirectory), realpath(target)]);
    if (!isWithin(root, real)) {
      throw new Error(`path ${JSON.stringify(path)} resolves outside the project root`);
    }
    return readFile(real, 'utf-8');
  }
}

function isWithin(root: string, path: string): boolean {
  const rel = relative(root, path);
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}
