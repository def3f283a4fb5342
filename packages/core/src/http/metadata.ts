import { Metadata } from '@grpc/grpc-js';
import { HeaderMap } from './HeaderMap.js';
import type { HttpVersion, MessageHead, RequestHead, ResponseHead } from './head.js';
import type { CompressionCodec, CompressionSetting } from '../utils/compression.js';

const STATUS = 'http-status';
const REASON = 'http-reason';
const METHOD = 'http-method';
const URI = 'http-uri';
const VERSION = 'http-version';
const HEADER_PREFIX = 'http-h-';

/**
 * Carries a message head as gRPC metadata.
 *
 * Header names are lowercased and prefixed with `http-h-`, since gRPC
 * reserves several plain HTTP names (`content-type`, `te`, `user-agent`).
 */
export function headToMetadata(head: MessageHead): Metadata {
  const metadata = new Metadata();
  metadata.set(VERSION, head.version);
  if (head.kind === 'response') {
    metadata.set(STATUS, String(head.status));
    if (head.reason) metadata.set(REASON, head.reason);
  } else {
    metadata.set(METHOD, head.method);
    metadata.set(URI, head.uri);
  }
  for (const { name, value } of head.headers) {
    metadata.add(HEADER_PREFIX + name.toLowerCase(), value);
  }
  return metadata;
}

/**
 * Reads a response head back. A missing status reads as 200.
 */
export function metadataToResponseHead(metadata: Metadata): ResponseHead {
  const status = Number(first(metadata, STATUS) ?? '200');
  return {
    kind: 'response',
    version: readVersion(metadata),
    status: Number.isInteger(status) ? status : 200,
    reason: first(metadata, REASON) ?? '',
    headers: readHeaders(metadata),
  };
}

/**
 * Reads a request head back. Missing method and uri read as `GET /`.
 */
export function metadataToRequestHead(metadata: Metadata): RequestHead {
  return {
    kind: 'request',
    version: readVersion(metadata),
    method: first(metadata, METHOD) ?? 'GET',
    uri: first(metadata, URI) ?? '/',
    headers: readHeaders(metadata),
  };
}

function first(metadata: Metadata, key: string): string | undefined {
  const value = metadata.get(key)[0];
  return typeof value === 'string' ? value : value?.toString('latin1');
}

function readVersion(metadata: Metadata): HttpVersion {
  return first(metadata, VERSION) === 'HTTP/1.0' ? 'HTTP/1.0' : 'HTTP/1.1';
}

function readHeaders(metadata: Metadata): HeaderMap {
  const headers = new HeaderMap();
  for (const [key, values] of Object.entries(metadata.toJSON())) {
    if (!key.startsWith(HEADER_PREFIX)) continue;
    const name = key.slice(HEADER_PREFIX.length);
    for (const value of values) {
      headers.append(name, typeof value === 'string' ? value : value.toString('latin1'));
    }
  }
  return headers;
}

const BODY_ENCODING = 'body-encoding';

/**
 * Marks the body messages following this metadata as compressed.
 */
export function setBodyEncoding(metadata: Metadata, codec: CompressionCodec | null): Metadata {
  if (codec) metadata.set(BODY_ENCODING, codec);
  return metadata;
}

export function readBodyEncoding(metadata: Metadata): CompressionSetting {
  const codec = first(metadata, BODY_ENCODING);
  return codec === 'gzip' || codec === 'snappy' ? { codec } : false;
}
