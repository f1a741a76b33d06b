export { createFilesystemExportWriter } from './fs.js';
