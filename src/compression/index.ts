/**
 * IPC message compression barrel export.
 */

export { compress } from './compress.js';
export { decompress } from './decompress.js';
