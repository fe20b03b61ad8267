import { Buffer } from 'node:buffer';
import { createHmac, timingSafeEqual } from 'node:crypto';

import { SignatureError } from '../errors/app-error.js';

export type SigningKey = string | Uint8Array;
export type TokenEncoding = 'base64url' | 'hex';

const DIGEST_ALGORITHM = 'sha1';
const DIGEST_BYTES = 20;
const HEX_TAG_LENGTH = DIGEST_BYTES * 2;

const HEX_PATTERN = /^[0-9a-f]+$/;
const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function computeTag(key: SigningKey, target: Uint8Array): Buffer {
  return createHmac(DIGEST_ALGORITHM, key).update(target).digest();
}

function encodeBytes(bytes: Uint8Array, encoding: TokenEncoding): string {
  return Buffer.from(bytes).toString(encoding);
}

function decodeSegment(segment: string, encoding: TokenEncoding): Buffer {
  if (encoding === 'hex') {
    if (segment.length % 2 !== 0 || !HEX_PATTERN.test(segment)) {
      throw new SignatureError('malformed', 'Invalid hex segment');
    }
    return Buffer.from(segment, 'hex');
  }

  // one leftover char can never carry a whole byte
  if (segment.length % 4 === 1 || !BASE64URL_PATTERN.test(segment)) {
    throw new SignatureError('malformed', 'Invalid base64url segment');
  }
  const bytes = Buffer.from(segment, 'base64url');
  // reject spare low bits in the last char so each value has one spelling
  if (bytes.toString('base64url') !== segment) {
    throw new SignatureError('malformed', 'Non-canonical base64url segment');
  }
  return bytes;
}

export function detectEncoding(tag: string, encodedUrl: string): TokenEncoding {
  return tag.length === HEX_TAG_LENGTH &&
    HEX_PATTERN.test(tag) &&
    HEX_PATTERN.test(encodedUrl)
    ? 'hex'
    : 'base64url';
}

function verifyTag(key: SigningKey, supplied: Buffer, target: Buffer): void {
  if (supplied.length !== DIGEST_BYTES) {
    throw new SignatureError('malformed', 'Signature has the wrong length');
  }
  if (!timingSafeEqual(supplied, computeTag(key, target))) {
    throw new SignatureError('mismatch');
  }
}

function toUtf8(bytes: Buffer): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new SignatureError('malformed', 'Encoded URL is not valid UTF-8');
  }
}

/**
 * Sign a target URL into a `<tag>/<encodedUrl>` token.
 */
export function encode(
  key: SigningKey,
  targetUrl: string,
  encoding: TokenEncoding = 'base64url'
): string {
  const target = Buffer.from(targetUrl, 'utf8');
  const tag = computeTag(key, target);
  return `${encodeBytes(tag, encoding)}/${encodeBytes(target, encoding)}`;
}

export function decodeParts(
  key: SigningKey,
  tag: string,
  encodedUrl: string
): string {
  if (!tag || !encodedUrl) {
    throw new SignatureError('malformed', 'Token is missing a segment');
  }

  const encoding = detectEncoding(tag, encodedUrl);
  const suppliedTag = decodeSegment(tag, encoding);
  const target = decodeSegment(encodedUrl, encoding);
  const targetUrl = toUtf8(target);
  verifyTag(key, suppliedTag, target);
  return targetUrl;
}

/**
 * Verify a token and return the URL it carries.
 *
 * Accepts the token with or without its leading slash. Throws
 * `SignatureError` with reason `malformed` when the token cannot be parsed
 * and `mismatch` when the tag does not verify.
 */
export function decode(key: SigningKey, token: string): string {
  const parts = token.replace(/^\/+/, '').split('/');
  if (parts.length !== 2) {
    throw new SignatureError('malformed', 'Token must have two segments');
  }
  const [tag = '', encodedUrl = ''] = parts;
  return decodeParts(key, tag, encodedUrl);
}

/**
 * Verify the older `/<hexTag>?url=<target>` form, where the URL travels in
 * the clear and only the tag is encoded.
 */
export function verifyQueryToken(
  key: SigningKey,
  hexTag: string,
  targetUrl: string
): string {
  if (!targetUrl) {
    throw new SignatureError('malformed', 'Missing url parameter');
  }
  const suppliedTag = decodeSegment(hexTag, 'hex');
  verifyTag(key, suppliedTag, Buffer.from(targetUrl, 'utf8'));
  return targetUrl;
}
