import fs from 'fs';
import type { IFileLoader } from '../../core/interfaces/IFileLoader.js';
import { EmptyContentError, NotFoundError, ReadError, describeError } from '../../core/errors.js';

// fs errors may come from another realm (e.g. under a test runner), so read the code structurally
function errnoCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Reads UTF-8 text files for comparison
 */
export class TextFileLoader implements IFileLoader {
  private decoder = new TextDecoder('utf-8', { fatal: true });

  async load(path: string): Promise<string> {
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(path);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw new NotFoundError(path, { cause: error });
      }
      throw new ReadError(path, describeError(error), { cause: error });
    }

    let text: string;
    try {
      text = this.decoder.decode(bytes);
    } catch (error) {
      throw new ReadError(path, `not valid UTF-8 (${describeError(error)})`, { cause: error });
    }

    const content = text.trim();
    if (!content) {
      throw new EmptyContentError(path);
    }
    return content;
  }
}
