import { readFile } from 'fs/promises';
import { basename } from 'path';
import { CanvasIOError } from '../errors';
import type { ImageSource } from './PageCanvas';

export type ImageFormat = 'png' | 'jpeg';

/**
 * An image source resolved to bytes, or the reason it could not be.
 */
export type LoadedImage =
  | { source: ImageSource; status: 'ok'; format: ImageFormat; bytes: Uint8Array }
  | { source: ImageSource; status: 'missing' | 'unsupported'; reason: string };

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Identify PNG and JPEG data by their leading bytes.
 */
export function detectImageFormat(bytes: Uint8Array): ImageFormat | null {
  if (bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((b, i) => bytes[i] === b)) {
    return 'png';
  }
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'jpeg';
  }
  return null;
}

/**
 * Short human-readable label for an image source, used in placeholders
 * and log messages.
 */
export function describeImageSource(source: ImageSource): string {
  if (typeof source !== 'string') {
    return `<${source.length} bytes>`;
  }
  if (source.startsWith('data:')) {
    const mime = source.slice(5, source.search(/[;,]/));
    return `<${mime || 'data'} data URL>`;
  }
  return basename(source);
}

function decodeDataUrl(dataUrl: string): Uint8Array | null {
  // data:[<mediatype>][;base64],<data>
  const match = dataUrl.match(/^data:([^;,]*)(;base64)?,(.*)$/s);
  if (!match) return null;
  if (match[2]) {
    return new Uint8Array(Buffer.from(match[3], 'base64'));
  }
  return new Uint8Array(Buffer.from(decodeURIComponent(match[3]), 'binary'));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}

/**
 * Resolve one image source to bytes.
 *
 * A file that does not exist is reported as 'missing' so the report can
 * carry a placeholder; any other read failure is a CanvasIOError.
 */
export async function loadImage(source: ImageSource): Promise<LoadedImage> {
  let bytes: Uint8Array | null;

  if (typeof source !== 'string') {
    bytes = source;
  } else if (source.startsWith('data:')) {
    bytes = decodeDataUrl(source);
    if (!bytes) {
      return { source, status: 'unsupported', reason: 'malformed data URL' };
    }
  } else {
    try {
      bytes = new Uint8Array(await readFile(source));
    } catch (error) {
      if (isNotFound(error)) {
        return { source, status: 'missing', reason: `file not found: ${source}` };
      }
      throw new CanvasIOError(`Failed to read image ${source}`, { cause: error, path: source });
    }
  }

  const format = detectImageFormat(bytes);
  if (!format) {
    return { source, status: 'unsupported', reason: 'not a PNG or JPEG image' };
  }
  return { source, status: 'ok', format, bytes };
}

/**
 * Load every distinct source once, preserving first-seen order.
 */
export async function loadImages(sources: Iterable<ImageSource>): Promise<LoadedImage[]> {
  const unique: ImageSource[] = [];
  const seen = new Set<ImageSource>();
  for (const source of sources) {
    if (!seen.has(source)) {
      seen.add(source);
      unique.push(source);
    }
  }
  return Promise.all(unique.map(source => loadImage(source)));
}
