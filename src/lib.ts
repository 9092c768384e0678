/**
 * Public API of the kdb+ IPC client.
 *
 * @example
 * ```typescript
 * import { KdbConnection, k } from 'kdb-ipc';
 *
 * const conn = await KdbConnection.open({ host: 'localhost', port: 5010 });
 * const result = await conn.sendSync('{x+y}', k.long(1n), k.long(2n));
 * conn.close();
 * ```
 */

export * from './model/index.js';
export * from './codec/index.js';
export * from './compression/index.js';
export * from './framing/index.js';
export * from './connection/index.js';
export * from './publisher/index.js';
