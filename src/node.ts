/**
 * Node.js entry point: file sniffing, directory scans and synchronous
 * file handles. Import from 'media-sniff/node'.
 */

export { sniffFile } from './operations/sniff.js';
export type { SniffSource, SniffOptions } from './operations/sniff.js';
export { scanDir, scanFiles } from './operations/scan.js';
export { FileStream } from './stream/file-stream.js';
export type { FileMode } from './stream/file-stream.js';
