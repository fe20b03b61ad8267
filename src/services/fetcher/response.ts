import { Transform, type TransformCallback } from 'node:stream';

import {
  MalformedUpstreamError,
  PolicyViolationError,
} from '../../errors/app-error.js';

// RFC 9110 token characters
const TOKEN = "[!#$%&'*+.^_`|~0-9A-Za-z-]+";
const MEDIA_TYPE_PATTERN = new RegExp(`^(${TOKEN})/(${TOKEN})$`);

export interface MediaType {
  type: string;
  subtype: string;
  essence: string;
}

/**
 * Parse the `type/subtype` part of a Content-Type header. Parameters after
 * `;` are ignored. Null when the value is not a media type.
 */
export function parseMediaType(contentType: string | null): MediaType | null {
  if (contentType === null) return null;
  const semiIndex = contentType.indexOf(';');
  const essence = (
    semiIndex === -1 ? contentType : contentType.slice(0, semiIndex)
  )
    .trim()
    .toLowerCase();

  const match = MEDIA_TYPE_PATTERN.exec(essence);
  if (!match?.[1] || !match[2]) return null;
  return { type: match[1], subtype: match[2], essence };
}

export function assertAllowedContentType(
  contentType: string | null,
  url: string,
  allowContentVideo: boolean
): MediaType {
  const mediaType = parseMediaType(contentType);
  if (mediaType === null) {
    throw new MalformedUpstreamError(url, contentType);
  }

  const allowed =
    mediaType.type === 'image' ||
    (allowContentVideo && mediaType.type === 'video');
  if (!allowed) {
    throw new PolicyViolationError(
      'content-type',
      `Unsupported content type: ${mediaType.essence}`,
      url
    );
  }
  return mediaType;
}

export function assertContentLengthWithinLimit(
  contentLength: string | null,
  url: string,
  maxBytes: number
): void {
  if (!contentLength) return;
  const declared = Number.parseInt(contentLength, 10);
  if (Number.isNaN(declared) || declared <= maxBytes) return;

  throw new PolicyViolationError(
    'size',
    `Response of ${declared} bytes exceeds maximum size of ${maxBytes} bytes`,
    url
  );
}

/**
 * Pass-through stream that fails before forwarding the chunk that would
 * take the running total past `maxBytes`.
 */
export function createByteLimit(maxBytes: number, url: string): Transform {
  let total = 0;
  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      total += chunk.byteLength;
      if (total > maxBytes) {
        callback(
          new PolicyViolationError(
            'size',
            `Response exceeds maximum size of ${maxBytes} bytes`,
            url
          )
        );
        return;
      }
      callback(null, chunk);
    },
  });
}
