/**
 * Abstraction for writing analysis exports.
 * Allows testing without touching the filesystem.
 */
export interface ExportWriter {
  /**
   * Append content to a file, creating it if needed.
   * @returns The path written
   */
  appendFile(fileName: string, content: string): Promise<string>;

  /**
   * Write (or replace) a file.
   * @returns The path written
   */
  writeFile(fileName: string, content: string): Promise<string>;
}
