/**
 * Image format detected from file signature
 */
export type ImageType = {
  extension: string;
  mimeType: string;
};

const ascii = (bytes: Uint8Array, start: number, end: number): string =>
  String.fromCharCode(...bytes.subarray(start, end));

function startsWith(bytes: Uint8Array, signature: number[]): boolean {
  return bytes.length >= signature.length && signature.every((value, i) => bytes[i] === value);
}

/**
 * Detect an image format from its magic bytes
 *
 * @returns undefined when the bytes are not a known image
 */
export function detectImageType(bytes: Uint8Array): ImageType | undefined {
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) {
    return { extension: 'jpg', mimeType: 'image/jpeg' };
  }
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) {
    return { extension: 'png', mimeType: 'image/png' };
  }
  if (bytes.length >= 6 && (ascii(bytes, 0, 6) === 'GIF87a' || ascii(bytes, 0, 6) === 'GIF89a')) {
    return { extension: 'gif', mimeType: 'image/gif' };
  }
  if (bytes.length >= 12 && ascii(bytes, 0, 4) === 'RIFF' && ascii(bytes, 8, 12) === 'WEBP') {
    return { extension: 'webp', mimeType: 'image/webp' };
  }
  if (bytes.length >= 12 && ascii(bytes, 4, 8) === 'ftyp') {
    const brand = ascii(bytes, 8, 12);
    if (brand === 'avif' || brand === 'avis') {
      return { extension: 'avif', mimeType: 'image/avif' };
    }
    if (['heic', 'heix', 'mif1', 'msf1'].includes(brand)) {
      return { extension: 'heic', mimeType: 'image/heic' };
    }
  }
  if (bytes.length >= 14 && ascii(bytes, 0, 2) === 'BM') {
    return { extension: 'bmp', mimeType: 'image/bmp' };
  }
  return undefined;
}
