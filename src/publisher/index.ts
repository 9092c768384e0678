/**
 * Publisher barrel export.
 */

export { KdbPublisher } from './KdbPublisher.js';
export type { KdbPublisherOptions, SendOptions } from './KdbPublisher.js';
