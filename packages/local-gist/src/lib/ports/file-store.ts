/**
 * Abstraction over where downloaded bytes end up.
 * Lets tests inject write failures without touching real permissions.
 */
export interface FileStore {
  /** Write `data` to `path`, creating parent directories and replacing any existing file */
  write(path: string, data: Uint8Array): Promise<void>;
}
