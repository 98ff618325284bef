import sharp from "sharp";
import { MAX_IMAGE_DIMENSION, MAX_UPLOAD_BYTES } from "@shared/routes";
import { ErrorCode, ValidationError } from "./error-handling";

export type ImageFormat = 'jpeg' | 'png' | 'webp' | 'gif' | 'avif' | 'bmp' | 'svg';

export const CONTENT_TYPES: Record<ImageFormat, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
  gif: 'image/gif',
  avif: 'image/avif',
  bmp: 'image/bmp',
  svg: 'image/svg+xml',
};

export interface ValidatedImage {
  // Upload bytes as received; the content digest is taken over these
  buffer: Buffer;
  format: ImageFormat;
  // What goes to blob storage, and its type
  stored: Buffer;
  contentType: string;
  width: number;
  height: number;
}

export interface BmpHeader {
  width: number;
  height: number;
  topDown: boolean;
  bitsPerPixel: number;
  compression: number;
  pixelOffset: number;
  rowSize: number;
  headerSize: number;
  colorsUsed: number;
}

export interface DecodedBitmap {
  data: Buffer;
  width: number;
  height: number;
  channels: 3;
}

const FORMAT_MESSAGE = 'The image must be a valid image file (JPEG, PNG, WebP, GIF, AVIF, BMP, SVG).';
const INVALID_MESSAGE = 'The file must be a valid image.';
const BMP_VARIANT_MESSAGE = 'Unsupported BMP variant: run-length and embedded JPEG/PNG bitmaps are not accepted.';

const BI_RGB = 0;
const BI_BITFIELDS = 3;
const BI_ALPHABITFIELDS = 6;
const BMP_DEPTHS = new Set([1, 4, 8, 16, 24, 32]);
const FILE_HEADER_SIZE = 14;

export function isBmp(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === 0x42 && buffer[1] === 0x4d; // "BM"
}

export function readBmpHeader(buffer: Buffer): BmpHeader {
  if (!isBmp(buffer) || buffer.length < 54) {
    throw new ValidationError(INVALID_MESSAGE);
  }
  const headerSize = buffer.readUInt32LE(14);
  // OS/2 core headers carry 16-bit sizes and are not read
  if (headerSize < 40) {
    throw new ValidationError(BMP_VARIANT_MESSAGE, 'image', ErrorCode.UNSUPPORTED_FORMAT);
  }
  const pixelOffset = buffer.readUInt32LE(10);
  const width = buffer.readInt32LE(18);
  const rawHeight = buffer.readInt32LE(22);
  const bitsPerPixel = buffer.readUInt16LE(28);
  const compression = buffer.readUInt32LE(30);

  if (width <= 0 || rawHeight === 0) {
    throw new ValidationError(INVALID_MESSAGE);
  }

  return {
    width,
    height: Math.abs(rawHeight),
    topDown: rawHeight < 0,
    bitsPerPixel,
    compression,
    pixelOffset,
    rowSize: Math.ceil((bitsPerPixel * width) / 32) * 4,
    headerSize,
    colorsUsed: buffer.readUInt32LE(46),
  };
}

// Writes one RGB pixel of a row into out at dst
type PixelReader = (rowStart: number, x: number, out: Buffer, dst: number) => void;

function paletteReader(buffer: Buffer, header: BmpHeader): PixelReader {
  const { bitsPerPixel, pixelOffset } = header;
  const paletteStart = FILE_HEADER_SIZE + header.headerSize;
  const count = header.colorsUsed || 2 ** bitsPerPixel;
  if (paletteStart + count * 4 > pixelOffset) {
    throw new ValidationError(INVALID_MESSAGE);
  }
  const indexMask = (1 << bitsPerPixel) - 1;

  return (rowStart, x, out, dst) => {
    const bitOffset = x * bitsPerPixel;
    const byte = buffer[rowStart + Math.floor(bitOffset / 8)];
    const index = (byte >> (8 - bitsPerPixel - (bitOffset % 8))) & indexMask;
    if (index >= count) {
      throw new ValidationError(INVALID_MESSAGE);
    }
    // Palette entries are BGRX
    const entry = paletteStart + index * 4;
    out[dst] = buffer[entry + 2];
    out[dst + 1] = buffer[entry + 1];
    out[dst + 2] = buffer[entry];
  };
}

function maskChannel(mask: number): (value: number) => number {
  if (mask === 0) return () => 0;
  let shift = 0;
  while (((mask >>> shift) & 1) === 0) shift++;
  let bits = 0;
  while (shift + bits < 32 && ((mask >>> (shift + bits)) & 1) === 1) bits++;
  const max = 2 ** bits - 1;
  return (value) => Math.round((((value & mask) >>> shift) * 255) / max);
}

function maskReader(buffer: Buffer, header: BmpHeader): PixelReader {
  const { bitsPerPixel, compression } = header;
  let masks: [number, number, number];
  if (compression === BI_RGB) {
    masks = bitsPerPixel === 16 ? [0x7c00, 0x03e0, 0x001f] : [0x00ff0000, 0x0000ff00, 0x000000ff];
  } else {
    // Masks follow a 40-byte header, and sit at the same offset inside larger ones
    if (buffer.length < 66 || header.pixelOffset < 66) {
      throw new ValidationError(INVALID_MESSAGE);
    }
    masks = [buffer.readUInt32LE(54), buffer.readUInt32LE(58), buffer.readUInt32LE(62)];
  }
  const [red, green, blue] = masks.map(maskChannel);
  const bytesPerPixel = bitsPerPixel / 8;

  return (rowStart, x, out, dst) => {
    const src = rowStart + x * bytesPerPixel;
    const value = bitsPerPixel === 16 ? buffer.readUInt16LE(src) : buffer.readUInt32LE(src);
    out[dst] = red(value);
    out[dst + 1] = green(value);
    out[dst + 2] = blue(value);
  };
}

const bgrReader = (buffer: Buffer): PixelReader => (rowStart, x, out, dst) => {
  const src = rowStart + x * 3;
  out[dst] = buffer[src + 2];
  out[dst + 1] = buffer[src + 1];
  out[dst + 2] = buffer[src];
};

/**
 * Decode an uncompressed bitmap (paletted, 16, 24 or 32 bit, with or
 * without channel masks) into top-down RGB rows. Alpha is dropped.
 */
export function decodeBmp(buffer: Buffer): DecodedBitmap {
  const header = readBmpHeader(buffer);
  const { width, height, topDown, bitsPerPixel, compression, pixelOffset, rowSize } = header;

  const masked = compression === BI_BITFIELDS || compression === BI_ALPHABITFIELDS;
  const supported = BMP_DEPTHS.has(bitsPerPixel)
    && (compression === BI_RGB || (masked && (bitsPerPixel === 16 || bitsPerPixel === 32)));
  if (!supported) {
    throw new ValidationError(BMP_VARIANT_MESSAGE, 'image', ErrorCode.UNSUPPORTED_FORMAT);
  }
  if (pixelOffset + rowSize * height > buffer.length) {
    throw new ValidationError(INVALID_MESSAGE);
  }

  const read = bitsPerPixel <= 8
    ? paletteReader(buffer, header)
    : bitsPerPixel === 24 ? bgrReader(buffer) : maskReader(buffer, header);

  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    const sourceRow = topDown ? y : height - 1 - y;
    const rowStart = pixelOffset + sourceRow * rowSize;
    for (let x = 0; x < width; x++) {
      read(rowStart, x, data, (y * width + x) * 3);
    }
  }

  return { data, width, height, channels: 3 };
}

/**
 * sharp pipeline for any accepted upload; bitmaps go through the in-process decoder
 */
export function openImage(buffer: Buffer): sharp.Sharp {
  if (isBmp(buffer)) {
    const bitmap = decodeBmp(buffer);
    return sharp(bitmap.data, {
      raw: { width: bitmap.width, height: bitmap.height, channels: bitmap.channels },
    });
  }
  return sharp(buffer);
}

export const ANALYSIS_MAX_DIMENSION = 1536;

/**
 * JPEG both models see. Corrections teach the classifier with the same rendition.
 */
export function toAnalysisJpeg(buffer: Buffer): Promise<Buffer> {
  return openImage(buffer)
    .rotate()
    .resize(ANALYSIS_MAX_DIMENSION, ANALYSIS_MAX_DIMENSION, { fit: 'inside', withoutEnlargement: true })
    .flatten({ background: '#ffffff' })
    .jpeg({ quality: 90 })
    .toBuffer();
}

function toImageFormat(metadata: sharp.Metadata): ImageFormat | null {
  switch (metadata.format) {
    case 'jpeg':
    case 'png':
    case 'webp':
    case 'gif':
    case 'svg':
      return metadata.format;
    case 'heif':
      // AVIF is reported as HEIF with AV1 compression; HEIC is not accepted
      return metadata.compression === 'av1' ? 'avif' : null;
    default:
      return null;
  }
}

function checkDimensions(width: number, height: number): void {
  if (width > MAX_IMAGE_DIMENSION || height > MAX_IMAGE_DIMENSION) {
    throw new ValidationError(`Image dimensions are too large. Maximum ${MAX_IMAGE_DIMENSION}x${MAX_IMAGE_DIMENSION} pixels.`);
  }
}

export async function validateUpload(buffer: Buffer): Promise<ValidatedImage> {
  if (buffer.length === 0) {
    throw new ValidationError('Please select an image to upload.');
  }
  if (buffer.length > MAX_UPLOAD_BYTES) {
    throw new ValidationError('The image must not be larger than 10MB.', 'image', ErrorCode.IMAGE_TOO_LARGE);
  }

  if (isBmp(buffer)) {
    const header = readBmpHeader(buffer);
    checkDimensions(header.width, header.height);
    // Full decode proves the pixel data is there
    decodeBmp(buffer);
    return { buffer, format: 'bmp', stored: buffer, contentType: CONTENT_TYPES.bmp, width: header.width, height: header.height };
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(buffer).metadata();
  } catch {
    throw new ValidationError(INVALID_MESSAGE);
  }

  const format = toImageFormat(metadata);
  if (!format) {
    throw new ValidationError(FORMAT_MESSAGE, 'image', ErrorCode.UNSUPPORTED_FORMAT);
  }
  if (!metadata.width || !metadata.height) {
    throw new ValidationError(INVALID_MESSAGE);
  }
  checkDimensions(metadata.width, metadata.height);

  // Vector markup can carry script; only its rendering is kept
  if (format === 'svg') {
    const png = await sharp(buffer).png().toBuffer();
    return { buffer, format, stored: png, contentType: CONTENT_TYPES.png, width: metadata.width, height: metadata.height };
  }

  return { buffer, format, stored: buffer, contentType: CONTENT_TYPES[format], width: metadata.width, height: metadata.height };
}

export function decodeBase64Image(input: string): Buffer {
  const base64 = input.startsWith('data:') ? input.slice(input.indexOf(',') + 1) : input;
  return Buffer.from(base64, 'base64');
}
