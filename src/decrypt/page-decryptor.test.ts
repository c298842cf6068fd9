import { createCipheriv } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { DecodeError } from '../errors/custom-errors';
import { decodePage } from './page-decryptor';

const JPEG = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0x01, 0x01, 0x00, 0x00, 0x01, 0x00, 0x01, 0xff, 0xd9]);
const PNG = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

const KEY_16 = new Uint8Array(16).fill(7);
const KEY_32 = new Uint8Array(32).map((_, i) => i);
const IV = new Uint8Array(16).fill(3);

function encrypt(plaintext: Uint8Array, key: Uint8Array, iv: Uint8Array): Uint8Array {
  const cipher = createCipheriv(`aes-${key.length * 8}-cbc`, key, iv);
  cipher.setAutoPadding(false);
  return new Uint8Array(Buffer.concat([cipher.update(plaintext), cipher.final()]));
}

/** Zero-pad to a whole number of AES blocks */
function pad(bytes: Uint8Array): Uint8Array {
  const padded = new Uint8Array(Math.ceil(bytes.length / 16) * 16);
  padded.set(bytes);
  return padded;
}

function sizePrefixed(plaintext: Uint8Array, key: Uint8Array, size = plaintext.length): Uint8Array {
  const header = Buffer.alloc(8);
  header.writeBigUInt64LE(BigInt(size));
  return new Uint8Array(Buffer.concat([header, IV, encrypt(pad(plaintext), key, IV)]));
}

describe('decodePage', () => {
  it('should pass identity pages through and detect the type', () => {
    const page = decodePage(PNG, { type: 'identity' });
    expect(page.bytes).toEqual(PNG);
    expect(page.extension).toBe('png');
    expect(page.mimeType).toBe('image/png');
  });

  it('should reject empty input', () => {
    expect(() => decodePage(new Uint8Array(), { type: 'identity' })).toThrow(DecodeError);
  });

  it('should reject bytes that are not an image', () => {
    const html = new TextEncoder().encode('<html>Not found</html>');
    expect(() => decodePage(html, { type: 'identity' })).toThrow('Decoded identity page is not a recognized image');
  });

  describe('base64', () => {
    it('should unwrap plain base64 and data URLs', () => {
      const encoded = Buffer.from(JPEG).toString('base64');
      expect(decodePage(new TextEncoder().encode(encoded), { type: 'base64' }).bytes).toEqual(JPEG);

      const dataUrl = `data:image/jpeg;base64,${encoded.slice(0, 8)}\n${encoded.slice(8)}`;
      expect(decodePage(new TextEncoder().encode(dataUrl), { type: 'base64' }).extension).toBe('jpg');
    });

    it('should reject malformed base64', () => {
      expect(() => decodePage(new TextEncoder().encode('not*base64!'), { type: 'base64' })).toThrow(
        'Page is not valid base64',
      );
    });
  });

  describe('xor', () => {
    it('should undo a repeating key', () => {
      const key = new Uint8Array([0x5a, 0xa5, 0x0f]);
      const scrambled = JPEG.map((byte, i) => byte ^ (key[i % key.length] ?? 0));
      expect(decodePage(scrambled, { type: 'xor', key }).bytes).toEqual(JPEG);
    });

    it('should reject an empty key', () => {
      expect(() => decodePage(JPEG, { type: 'xor', key: new Uint8Array() })).toThrow('XOR key is empty');
    });

    it('should fail with the wrong key', () => {
      const scrambled = JPEG.map((byte) => byte ^ 0x11);
      expect(() => decodePage(scrambled, { type: 'xor', key: new Uint8Array([0x22]) })).toThrow(DecodeError);
    });
  });

  describe('aes-cbc', () => {
    it('should decrypt block-aligned ciphertext', () => {
      const plaintext = pad(JPEG);
      const page = decodePage(encrypt(plaintext, KEY_16, IV), { type: 'aes-cbc', key: KEY_16, iv: IV });
      expect(page.bytes).toEqual(plaintext);
      expect(page.extension).toBe('jpg');
    });

    it('should support AES-256 keys', () => {
      const plaintext = pad(PNG);
      expect(decodePage(encrypt(plaintext, KEY_32, IV), { type: 'aes-cbc', key: KEY_32, iv: IV }).bytes).toEqual(
        plaintext,
      );
    });

    it('should reject ciphertext that is not a multiple of the block size', () => {
      const ciphertext = encrypt(pad(JPEG), KEY_16, IV).subarray(0, 20);
      expect(() => decodePage(ciphertext, { type: 'aes-cbc', key: KEY_16, iv: IV })).toThrow(
        'Ciphertext length 20 is not a multiple of 16',
      );
    });

    it('should reject bad key and IV lengths', () => {
      expect(() => decodePage(pad(JPEG), { type: 'aes-cbc', key: new Uint8Array(10), iv: IV })).toThrow(
        'Invalid AES key length: 10',
      );
      expect(() => decodePage(pad(JPEG), { type: 'aes-cbc', key: KEY_16, iv: new Uint8Array(8) })).toThrow(
        'Invalid AES IV length: 8',
      );
    });
  });

  describe('size-prefixed-aes', () => {
    it('should decrypt and truncate to the size prefix', () => {
      const page = decodePage(sizePrefixed(JPEG, KEY_32), { type: 'size-prefixed-aes', key: KEY_32 });
      expect(page.bytes).toEqual(JPEG);
      expect(page.bytes).toHaveLength(JPEG.length);
    });

    it('should reject a size larger than the plaintext', () => {
      expect(() =>
        decodePage(sizePrefixed(JPEG, KEY_32, 1000), { type: 'size-prefixed-aes', key: KEY_32 }),
      ).toThrow('Size prefix 1000 does not fit 32 decrypted bytes');
    });

    it('should reject a zero size', () => {
      expect(() => decodePage(sizePrefixed(JPEG, KEY_32, 0), { type: 'size-prefixed-aes', key: KEY_32 })).toThrow(
        DecodeError,
      );
    });

    it('should reject input shorter than the header', () => {
      expect(() => decodePage(new Uint8Array(24), { type: 'size-prefixed-aes', key: KEY_32 })).toThrow(
        'Page is too short for its size and IV header',
      );
    });

    it('should reject a corrupted body', () => {
      const raw = sizePrefixed(JPEG, KEY_32);
      raw[24] = (raw[24] ?? 0) ^ 0xff;
      expect(() => decodePage(raw, { type: 'size-prefixed-aes', key: KEY_32 })).toThrow(DecodeError);
    });
  });
});
