import { afterEach, describe, expect, it, vi } from 'vitest';
import { ParseError } from '../../errors/custom-errors';
import { SourceSession } from '../session';
import { hexToBytes, MangaPlusSource } from './manga-plus-source';

const KEY_A = 'ab'.repeat(64);
const KEY_B = '0f'.repeat(64);
const PAGE_BASE = 'https://mangaplus.shueisha.co.jp/drm/title/100001/chapter/1000002/manga_page/super_high';

// Protobuf-like bodies; only the bytes the parser looks for matter
const VIEWER_BODY = [
  `\x0a\x01${PAGE_BASE}/1.jpg?key=p1\x10\x00`,
  `\x01${KEY_A}\x0a`,
  `\x0a\x01${PAGE_BASE}/2.jpg?key=p2\x10\x00`,
  `\x01${KEY_B}\x0a`,
  '\x22\x10Chapter 1: Start\x2a\x04#001\x3aMANGA_Plus Sample Blade\x12\x00',
].join('');

const TITLE_BODY = [
  '\x0a\x20\x12\x0cSample Blade\x1a\x05Artsy',
  '\x22\x18https://example.com/chapter/1000003\x2a',
  '\x22\x18https://example.com/chapter/1000001\x2a',
  '\x22\x18https://example.com/chapter/1000003\x2a',
].join('');

describe('hexToBytes', () => {
  it('should convert hex pairs', () => {
    expect(hexToBytes('00ff10Aa')).toEqual(new Uint8Array([0x00, 0xff, 0x10, 0xaa]));
  });

  it('should reject odd length and non-hex input', () => {
    expect(hexToBytes('abc')).toBeUndefined();
    expect(hexToBytes('zz')).toBeUndefined();
  });
});

describe('MangaPlusSource', () => {
  const source = new MangaPlusSource();

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should resolve titles and viewer URLs', async () => {
    expect(await source.resolve('https://mangaplus.shueisha.co.jp/titles/100001')).toEqual({
      platform: 'mangaplus',
      kind: 'series',
      id: '100001',
      url: 'https://mangaplus.shueisha.co.jp/titles/100001',
    });
    expect((await source.resolve('https://mangaplus.shueisha.co.jp/viewer/1000002')).kind).toBe('issue');
  });

  it('should list chapters sorted and de-duplicated', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(TITLE_BODY));
    vi.stubGlobal('fetch', fetchMock);

    const series = await source.getSeries(
      await source.resolve('https://mangaplus.shueisha.co.jp/titles/100001'),
      new SourceSession(),
    );

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://jumpg-webapi.tokyo-cdn.com/api/title_detailV2?title_id=100001');
    expect(series.title).toBe('Sample Blade');
    expect(series.issues.map((issue) => issue.ref.id)).toEqual(['1000001', '1000003']);
    expect(series.issues[0]).toEqual({
      ref: {
        platform: 'mangaplus',
        kind: 'issue',
        id: '1000001',
        url: 'https://mangaplus.shueisha.co.jp/viewer/1000001',
      },
      order: 1000001,
      metadata: { series: 'Sample Blade', source: 'Manga Plus', readingDirection: 'rtl' },
    });
  });

  it('should read chapter metadata', () => {
    expect(source.parseMetadata(VIEWER_BODY)).toEqual({
      title: 'Chapter 1: Start',
      series: 'Sample Blade',
      issueNumber: 1,
      readingDirection: 'rtl',
      source: 'Manga Plus',
    });
  });

  it('should pair every page with its XOR key', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(VIEWER_BODY)),
    );

    const pages = await source.listPages(
      await source.resolve('https://mangaplus.shueisha.co.jp/viewer/1000002'),
      new SourceSession(),
    );

    expect(pages).toHaveLength(2);
    expect(pages[0]).toEqual({
      issueId: '1000002',
      index: 0,
      url: `${PAGE_BASE}/1.jpg?key=p1`,
      decode: { type: 'xor', key: new Uint8Array(64).fill(0xab) },
    });
    expect(pages[1]?.url).toBe(`${PAGE_BASE}/2.jpg?key=p2`);
    expect(pages[1]?.decode).toEqual({ type: 'xor', key: new Uint8Array(64).fill(0x0f) });
  });

  it('should fail when pages and keys do not pair up', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(`\x0a\x01${PAGE_BASE}/1.jpg\x10\x00`)),
    );

    await expect(
      source.listPages(await source.resolve('https://mangaplus.shueisha.co.jp/viewer/1000002'), new SourceSession()),
    ).rejects.toThrow(ParseError);
  });
});
