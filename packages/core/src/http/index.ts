export type { Header } from './HeaderMap.js';
export { HeaderMap } from './HeaderMap.js';
export type { HttpVersion, MessageHead, RequestHead, ResponseHead } from './head.js';
export {
  assertValidHeader,
  encodeChunk,
  encodeHead,
  formatStartLine,
  isValidHeaderName,
  isValidHeaderValue,
  isValidMethod,
  isValidStatusCode,
  LAST_CHUNK,
  mayHaveBody,
  reasonPhrase,
} from './head.js';
export type { WebsocketFrame } from './frame.js';
export { BinaryFrame, TextFrame, encodeFrame } from './frame.js';
export {
  headToMetadata,
  metadataToRequestHead,
  metadataToResponseHead,
  readBodyEncoding,
  setBodyEncoding,
} from './metadata.js';
