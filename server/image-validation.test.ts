import sharp from 'sharp';
import { MAX_UPLOAD_BYTES } from '@shared/routes';
import { ErrorCode, ValidationError } from './error-handling';
import { decodeBase64Image, decodeBmp, openImage, toAnalysisJpeg, validateUpload } from './image-validation';
import { makePng } from './test-fakes';

interface BitmapLayout {
  bitsPerPixel: number;
  compression?: number;
  colorsUsed?: number;
  // Palette or channel masks, written between the header and the pixels
  table?: Buffer;
  top: Buffer;
  bottom: Buffer;
  topDown?: boolean;
}

function makeBitmap({ bitsPerPixel, compression = 0, colorsUsed = 0, table = Buffer.alloc(0), top, bottom, topDown = false }: BitmapLayout): Buffer {
  const pixelOffset = 54 + table.length;
  const header = Buffer.alloc(54);
  header.write('BM', 0, 'ascii');
  header.writeUInt32LE(pixelOffset + top.length + bottom.length, 2);
  header.writeUInt32LE(pixelOffset, 10);
  header.writeUInt32LE(40, 14);
  header.writeInt32LE(2, 18);
  header.writeInt32LE(topDown ? -2 : 2, 22);
  header.writeUInt16LE(1, 26);
  header.writeUInt16LE(bitsPerPixel, 28);
  header.writeUInt32LE(compression, 30);
  header.writeUInt32LE(colorsUsed, 46);
  return Buffer.concat(topDown ? [header, table, top, bottom] : [header, table, bottom, top]);
}

/**
 * 2x2 bitmaps. Top row red, green; bottom row blue, white.
 */
function makeBmp({ topDown = false, compression = 0 } = {}): Buffer {
  // BGR byte order, rows padded to 4 bytes
  return makeBitmap({
    bitsPerPixel: 24,
    compression,
    topDown,
    top: Buffer.from([0, 0, 255, 0, 255, 0, 0, 0]),
    bottom: Buffer.from([255, 0, 0, 255, 255, 255, 0, 0]),
  });
}

function makePalettedBmp(): Buffer {
  // BGRX entries: red, green, blue, white
  const palette = Buffer.from([0, 0, 255, 0, 0, 255, 0, 0, 255, 0, 0, 0, 255, 255, 255, 0]);
  return makeBitmap({
    bitsPerPixel: 8,
    colorsUsed: 4,
    table: palette,
    top: Buffer.from([0, 1, 0, 0]),
    bottom: Buffer.from([2, 3, 0, 0]),
  });
}

function makeBitfieldsBmp(): Buffer {
  // Masks pick RGBA byte order, the reverse of the default BGRA
  const masks = Buffer.alloc(12);
  masks.writeUInt32LE(0x000000ff, 0);
  masks.writeUInt32LE(0x0000ff00, 4);
  masks.writeUInt32LE(0x00ff0000, 8);
  return makeBitmap({
    bitsPerPixel: 32,
    compression: 3,
    table: masks,
    top: Buffer.from([255, 0, 0, 255, 0, 255, 0, 255]),
    bottom: Buffer.from([0, 0, 255, 255, 255, 255, 255, 255]),
  });
}

const EXPECTED_PIXELS = [255, 0, 0, 0, 255, 0, 0, 0, 255, 255, 255, 255];

async function rejection(promise: Promise<unknown>): Promise<ValidationError> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof ValidationError)) {
    throw new Error('expected a ValidationError');
  }
  return error;
}

describe('validateUpload', () => {
  it('accepts a PNG and reports its size', async () => {
    const png = await makePng(40, 30);
    const image = await validateUpload(png);
    expect(image.format).toBe('png');
    expect(image.contentType).toBe('image/png');
    expect(image.stored).toBe(png);
    expect(image.width).toBe(40);
    expect(image.height).toBe(30);
  });

  it('rejects an empty upload', async () => {
    const error = await rejection(validateUpload(Buffer.alloc(0)));
    expect(error.message).toBe('Please select an image to upload.');
    expect(error.code).toBe(ErrorCode.INVALID_IMAGE);
  });

  it('rejects uploads over the size limit before decoding', async () => {
    const error = await rejection(validateUpload(Buffer.alloc(MAX_UPLOAD_BYTES + 1)));
    expect(error.code).toBe(ErrorCode.IMAGE_TOO_LARGE);
    expect(error.getStatusCode()).toBe(413);
  });

  it('rejects bytes that are not an image', async () => {
    const error = await rejection(validateUpload(Buffer.from('definitely not an image')));
    expect(error.message).toBe('The file must be a valid image.');
  });

  it('rejects formats outside the accepted list', async () => {
    const tiff = await sharp({ create: { width: 4, height: 4, channels: 3, background: { r: 0, g: 0, b: 0 } } }).tiff().toBuffer();
    const error = await rejection(validateUpload(tiff));
    expect(error.code).toBe(ErrorCode.UNSUPPORTED_FORMAT);
  });

  it('accepts an uncompressed bitmap', async () => {
    const image = await validateUpload(makeBmp());
    expect(image.format).toBe('bmp');
    expect(image.contentType).toBe('image/bmp');
    expect(image.width).toBe(2);
    expect(image.height).toBe(2);
  });

  it('accepts paletted and bitfield bitmaps', async () => {
    expect((await validateUpload(makePalettedBmp())).format).toBe('bmp');
    expect((await validateUpload(makeBitfieldsBmp())).format).toBe('bmp');
  });

  it('keeps only a PNG rendering of SVG uploads', async () => {
    const svg = Buffer.from(
      '<svg xmlns="http://www.w3.org/2000/svg" width="20" height="10">'
      + '<rect width="20" height="10" fill="#cc8844"/><script>alert(1)</script></svg>',
    );

    const image = await validateUpload(svg);

    expect(image.format).toBe('svg');
    expect(image.buffer).toBe(svg);
    expect(image.contentType).toBe('image/png');
    expect(image.stored.includes('<script>')).toBe(false);
    const metadata = await sharp(image.stored).metadata();
    expect(metadata.format).toBe('png');
    expect(metadata.width).toBe(20);
    expect(metadata.height).toBe(10);
  });

  it('rejects compressed bitmaps as unsupported', async () => {
    const error = await rejection(validateUpload(makeBmp({ compression: 1 })));
    expect(error.code).toBe(ErrorCode.UNSUPPORTED_FORMAT);
  });

  it('rejects a truncated bitmap', async () => {
    const error = await rejection(validateUpload(makeBmp().subarray(0, 60)));
    expect(error.message).toBe('The file must be a valid image.');
  });
});

describe('decodeBmp', () => {
  it('returns top-down RGB rows from a bottom-up file', () => {
    const bitmap = decodeBmp(makeBmp());
    expect(Array.from(bitmap.data)).toEqual(EXPECTED_PIXELS);
  });

  it('reads top-down files the same way', () => {
    const bitmap = decodeBmp(makeBmp({ topDown: true }));
    expect(Array.from(bitmap.data)).toEqual(EXPECTED_PIXELS);
  });

  it('resolves palette indices', () => {
    expect(Array.from(decodeBmp(makePalettedBmp()).data)).toEqual(EXPECTED_PIXELS);
  });

  it('applies channel masks and drops alpha', () => {
    expect(Array.from(decodeBmp(makeBitfieldsBmp()).data)).toEqual(EXPECTED_PIXELS);
  });

  it('rejects a palette index past the color table', () => {
    const bitmap = makePalettedBmp();
    // First pixel of the bottom row
    bitmap[70] = 9;
    expect(() => decodeBmp(bitmap)).toThrow('The file must be a valid image.');
  });

  it('feeds sharp through openImage', async () => {
    const { data, info } = await openImage(makeBmp()).raw().toBuffer({ resolveWithObject: true });
    expect(info.width).toBe(2);
    expect(info.channels).toBe(3);
    expect(Array.from(data)).toEqual(EXPECTED_PIXELS);
  });
});

describe('toAnalysisJpeg', () => {
  it('bounds large images and converts them to JPEG', async () => {
    const jpeg = await toAnalysisJpeg(await makePng(2000, 1000));
    const metadata = await sharp(jpeg).metadata();
    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(1536);
    expect(metadata.height).toBe(768);
  });

  it('never enlarges small images', async () => {
    const metadata = await sharp(await toAnalysisJpeg(await makePng(32, 24))).metadata();
    expect(metadata.width).toBe(32);
    expect(metadata.height).toBe(24);
  });
});

describe('decodeBase64Image', () => {
  it('strips a data URL prefix', () => {
    expect(Array.from(decodeBase64Image('data:image/png;base64,AAEC'))).toEqual([0, 1, 2]);
    expect(Array.from(decodeBase64Image('AAEC'))).toEqual([0, 1, 2]);
  });
});
