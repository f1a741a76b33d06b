// Filesystem implementation of ExportWriter.
// Uses Node.js fs module for local filesystem operations.

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ExportWriter } from '../interfaces/index.js';

/**
 * Create an ExportWriter rooted at a directory.
 * The directory is created on first write.
 */
export function createFilesystemExportWriter(directory: string): ExportWriter {
  const resolve = async (fileName: string): Promise<string> => {
    await fs.mkdir(directory, { recursive: true });
    return path.join(directory, fileName);
  };

  return {
    async appendFile(fileName: string, content: string): Promise<string> {
      const filePath = await resolve(fileName);
      await fs.appendFile(filePath, content, 'utf-8');
      return filePath;
    },

    async writeFile(fileName: string, content: string): Promise<string> {
      const filePath = await resolve(fileName);
      await fs.writeFile(filePath, content, 'utf-8');
      return filePath;
    },
  };
}
