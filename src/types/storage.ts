// Report storage types

/**
 * Flat file storage over one report output directory.
 * Keys are plain file names within that directory.
 */
export interface ReportStorage {
  /** Directory the files live in */
  readonly root: string;
  /** Create the directory if missing */
  ensure(): Promise<void>;
  /** Write a file and return its full path */
  write(name: string, content: string): Promise<string>;
  read(name: string): Promise<string>;
  /** File names in the directory; empty when the directory does not exist */
  list(): Promise<string[]>;
  delete(name: string): Promise<void>;
  pathOf(name: string): string;
}
