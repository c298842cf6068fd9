import { createDecipheriv } from 'node:crypto';
import { DecodeError, errorMessage } from '../errors/custom-errors';
import type { DecodeScheme, PageData } from '../types/comic.types';
import { detectImageType } from './image-type';

const AES_BLOCK_SIZE = 16;
const SIZE_PREFIX_LENGTH = 8;
const IV_LENGTH = 16;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Turn the bytes of a fetched page into a verified image
 *
 * Pure: no I/O, never returns empty or truncated bytes.
 *
 * @throws DecodeError if the bytes cannot be decoded or are not an image
 */
export function decodePage(raw: Uint8Array, scheme: DecodeScheme): PageData {
  if (raw.length === 0) {
    throw new DecodeError('Page is empty');
  }

  const bytes = decodeBytes(raw, scheme);

  const type = detectImageType(bytes);
  if (!type) {
    throw new DecodeError(`Decoded ${scheme.type} page is not a recognized image`);
  }
  return { bytes, ...type };
}

function decodeBytes(raw: Uint8Array, scheme: DecodeScheme): Uint8Array {
  switch (scheme.type) {
    case 'identity':
      return raw;
    case 'base64':
      return unwrapBase64(raw);
    case 'xor':
      return xor(raw, scheme.key);
    case 'aes-cbc':
      return aesCbc(raw, scheme.key, scheme.iv);
    case 'size-prefixed-aes':
      return sizePrefixedAes(raw, scheme.key);
  }
}

/**
 * Accepts plain base64 or a `data:` URL
 */
function unwrapBase64(raw: Uint8Array): Uint8Array {
  let text = Buffer.from(raw).toString('latin1').trim();
  const comma = text.indexOf(',');
  if (text.startsWith('data:') && comma !== -1) {
    text = text.slice(comma + 1);
  }
  text = text.replace(/\s+/g, '');

  if (text.length === 0 || !BASE64_PATTERN.test(text)) {
    throw new DecodeError('Page is not valid base64');
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}

/**
 * XOR with a repeating key
 */
function xor(raw: Uint8Array, key: Uint8Array): Uint8Array {
  if (key.length === 0) {
    throw new DecodeError('XOR key is empty');
  }
  const out = new Uint8Array(raw.length);
  for (let i = 0; i < raw.length; i++) {
    out[i] = (raw[i] ?? 0) ^ (key[i % key.length] ?? 0);
  }
  return out;
}

/**
 * AES-CBC without padding; key size picks AES-128/192/256
 */
function aesCbc(ciphertext: Uint8Array, key: Uint8Array, iv: Uint8Array): Uint8Array {
  if (![16, 24, 32].includes(key.length)) {
    throw new DecodeError(`Invalid AES key length: ${key.length}`);
  }
  if (iv.length !== IV_LENGTH) {
    throw new DecodeError(`Invalid AES IV length: ${iv.length}`);
  }
  if (ciphertext.length === 0 || ciphertext.length % AES_BLOCK_SIZE !== 0) {
    throw new DecodeError(`Ciphertext length ${ciphertext.length} is not a multiple of ${AES_BLOCK_SIZE}`);
  }

  try {
    const decipher = createDecipheriv(`aes-${key.length * 8}-cbc`, key, iv);
    decipher.setAutoPadding(false);
    return new Uint8Array(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
  } catch (error) {
    throw new DecodeError(`AES decryption failed: ${errorMessage(error)}`);
  }
}

/**
 * Layout: 8-byte little-endian plaintext size, 16-byte IV, AES-256-CBC ciphertext
 */
function sizePrefixedAes(raw: Uint8Array, key: Uint8Array): Uint8Array {
  if (key.length !== 32) {
    throw new DecodeError(`Invalid AES-256 key length: ${key.length}`);
  }
  if (raw.length <= SIZE_PREFIX_LENGTH + IV_LENGTH) {
    throw new DecodeError('Page is too short for its size and IV header');
  }

  const size = Buffer.from(raw.buffer, raw.byteOffset, raw.byteLength).readBigUInt64LE(0);
  const iv = raw.subarray(SIZE_PREFIX_LENGTH, SIZE_PREFIX_LENGTH + IV_LENGTH);
  const plaintext = aesCbc(raw.subarray(SIZE_PREFIX_LENGTH + IV_LENGTH), key, iv);

  if (size === 0n || size > BigInt(plaintext.length)) {
    throw new DecodeError(`Size prefix ${size} does not fit ${plaintext.length} decrypted bytes`);
  }
  return plaintext.subarray(0, Number(size));
}
