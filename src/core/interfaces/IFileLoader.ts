/**
 * Interface for reading comparison inputs from disk
 */
export interface IFileLoader {
  /**
   * Return the trimmed UTF-8 content of a file.
   * Rejects with NotFoundError, EmptyContentError or ReadError.
   */
  load(path: string): Promise<string>;
}
