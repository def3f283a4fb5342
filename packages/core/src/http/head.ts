/**
 * HTTP/1.x message head serialization.
 * Writes the start line (status line or request line) followed by header lines and the empty line.
 */

import { STATUS_CODES } from 'node:http';
import type { Header, HeaderMap } from './HeaderMap.js';

export type HttpVersion = 'HTTP/1.0' | 'HTTP/1.1';

/**
 * Status line and headers of a response.
 */
export interface ResponseHead {
  kind: 'response';
  version: HttpVersion;
  status: number;
  /** Reason phrase; the standard one for `status` when left empty */
  reason: string;
  headers: HeaderMap;
  /** Answers a `HEAD` request: headers describe a body that is never sent. */
  bodiless?: boolean;
}

/**
 * Request line and headers of a request.
 */
export interface RequestHead {
  kind: 'request';
  version: HttpVersion;
  method: string;
  uri: string;
  headers: HeaderMap;
}

export type MessageHead = ResponseHead | RequestHead;

const CRLF = '\r\n';
const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const FIELD_VALUE = /^[\t\x20-\x7e\x80-\xff]*$/;

export const LAST_CHUNK = Buffer.from(`0${CRLF}${CRLF}`, 'latin1');

/**
 * Gets the standard reason phrase of a status code, or an empty string.
 */
export function reasonPhrase(status: number): string {
  return STATUS_CODES[status] ?? '';
}

/**
 * Checks a header name against the RFC 9110 token grammar.
 */
export function isValidHeaderName(name: string): boolean {
  return TOKEN.test(name);
}

/**
 * Rejects control characters, CR and LF included.
 */
export function isValidHeaderValue(value: string): boolean {
  return FIELD_VALUE.test(value);
}

export function isValidMethod(method: string): boolean {
  return TOKEN.test(method);
}

export function isValidStatusCode(status: number): boolean {
  return Number.isInteger(status) && status >= 100 && status <= 999;
}

/**
 * Formats the first line of a head without its CRLF.
 */
export function formatStartLine(head: MessageHead): string {
  if (head.kind === 'request') {
    return `${head.method} ${head.uri} ${head.version}`;
  }
  return `${head.version} ${head.status} ${head.reason || reasonPhrase(head.status)}`;
}

/**
 * Serializes a head into bytes.
 *
 * @param extra - Header lines appended after the head's own, e.g. a framing
 *   header the transport adds.
 */
export function encodeHead(head: MessageHead, extra: Header[] = []): Buffer {
  let text = formatStartLine(head) + CRLF;
  for (const { name, value } of head.headers) text += `${name}: ${value}${CRLF}`;
  for (const { name, value } of extra) text += `${name}: ${value}${CRLF}`;
  return Buffer.from(text + CRLF, 'latin1');
}

/**
 * Whether a message with this head may carry a body.
 * 1xx, 204 and 304 responses never do, nor do answers to `HEAD`.
 */
export function mayHaveBody(head: MessageHead): boolean {
  if (head.kind === 'request') return true;
  if (head.bodiless) return false;
  return head.status >= 200 && head.status !== 204 && head.status !== 304;
}

/**
 * Frames one chunk of a chunked transfer-coded body.
 */
export function encodeChunk(data: Uint8Array): Buffer {
  return Buffer.concat([
    Buffer.from(data.byteLength.toString(16) + CRLF, 'latin1'),
    data,
    Buffer.from(CRLF, 'latin1'),
  ]);
}

/**
 * Throws a `TypeError` for a header that cannot be written as-is.
 */
export function assertValidHeader(name: string, value: string): void {
  if (!isValidHeaderName(name)) throw new TypeError(`Invalid header name: "${name}"`);
  if (!isValidHeaderValue(value)) throw new TypeError(`Invalid value for header "${name}"`);
}
