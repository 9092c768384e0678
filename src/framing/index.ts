/**
 * Message framing barrel export.
 */

export { decodeMessage, encodeErrorMessage, encodeMessage } from './framer.js';
export { MESSAGE_KINDS, describeKind, parseHeader } from './header.js';
export type { DecodedMessage, EncodeOptions } from './framer.js';
export type { MessageHeader, MessageKind, MessageKindName } from './header.js';
