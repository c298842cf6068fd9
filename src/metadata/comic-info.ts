import * as cheerio from 'cheerio';
import { z } from 'zod';
import { ParseError, errorMessage } from '../errors/custom-errors';
import { type Author, type AuthorRole, AuthorRoleSchema, type IssueInfo, type IssueMetadata } from '../types/comic.types';

export const COMIC_INFO_FILENAME = 'ComicInfo.xml';
export const METADATA_JSON_FILENAME = 'panelgrab.json';

/** Credit elements, in ComicInfo.xsd order */
const CREDIT_ROLES: AuthorRole[] = ['Writer', 'Penciller', 'Inker', 'Colorist', 'Letterer', 'CoverArtist', 'Editor'];

/**
 * Escape text for use in XML element content
 */
export function escapeXml(text: string): string {
  return (
    text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&apos;')
      // biome-ignore lint/suspicious/noControlCharactersInRegex: Not allowed in XML 1.0
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F]/g, '')
  );
}

/**
 * Render metadata as ComicRack ComicInfo.xml
 *
 * Absent fields are omitted. Authors sharing a role are joined with ", ".
 */
export function toComicInfoXml(metadata: IssueMetadata): string {
  const elements: [string, string | number | undefined][] = [
    ['Title', metadata.title],
    ['Series', metadata.series],
    ['Number', metadata.issueNumber],
    ['Summary', metadata.description],
    ['Year', metadata.year],
    ['Month', metadata.month],
    ['Day', metadata.day],
    ...CREDIT_ROLES.map((role): [string, string | undefined] => {
      const names = (metadata.authors ?? []).filter((author) => author.role === role).map((author) => author.name);
      return [role, names.length > 0 ? names.join(', ') : undefined];
    }),
    ['Publisher', metadata.publisher],
    ['PageCount', metadata.pageCount],
    ['Manga', metadata.readingDirection === 'rtl' ? 'YesAndRightToLeft' : undefined],
  ];

  const lines = elements
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined && entry[1] !== '')
    .map(([tag, value]) => `  <${tag}>${escapeXml(String(value))}</${tag}>`);

  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<ComicInfo xmlns:xsd="http://www.w3.org/2001/XMLSchema" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">',
    ...lines,
    '</ComicInfo>',
    '',
  ].join('\n');
}

/**
 * Metadata document stored next to the pages, including the source reference
 */
export function toMetadataJson(issue: IssueInfo): string {
  const document = {
    ...issue.metadata,
    platform: issue.ref.platform,
    id: issue.ref.id,
    url: issue.ref.url,
  };
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Read metadata back from a ComicInfo.xml document
 *
 * Credits are split on commas. Unknown elements are ignored.
 */
export function fromComicInfoXml(xml: string): IssueMetadata {
  const $ = cheerio.load(xml, { xml: true });
  const text = (tag: string): string | undefined => {
    const value = $(`ComicInfo > ${tag}`).first().text().trim();
    return value === '' ? undefined : value;
  };
  const number = (tag: string): number | undefined => {
    const value = Number.parseInt(text(tag) ?? '', 10);
    return Number.isNaN(value) ? undefined : value;
  };

  const authors: Author[] = CREDIT_ROLES.flatMap((role) =>
    (text(role) ?? '')
      .split(',')
      .map((name) => name.trim())
      .filter((name) => name !== '')
      .map((name) => ({ name, role })),
  );

  return {
    title: text('Title'),
    series: text('Series'),
    issueNumber: number('Number'),
    description: text('Summary'),
    year: number('Year'),
    month: number('Month'),
    day: number('Day'),
    authors: authors.length > 0 ? authors : undefined,
    publisher: text('Publisher'),
    pageCount: number('PageCount'),
    readingDirection: text('Manga') === 'YesAndRightToLeft' ? 'rtl' : undefined,
  };
}

const MetadataDocumentSchema = z.object({
  title: z.string().optional(),
  series: z.string().optional(),
  publisher: z.string().optional(),
  issueNumber: z.number().optional(),
  year: z.number().int().optional(),
  month: z.number().int().optional(),
  day: z.number().int().optional(),
  description: z.string().optional(),
  authors: z.array(z.object({ name: z.string(), role: AuthorRoleSchema })).optional(),
  readingDirection: z.enum(['ltr', 'rtl']).optional(),
  source: z.string().optional(),
  pageCount: z.number().int().optional(),
});

/**
 * Read metadata back from a document written by `toMetadataJson`
 *
 * The source reference is dropped; a re-read file is its own source.
 * @throws ParseError on malformed JSON or unexpected fields
 */
export function fromMetadataJson(text: string): IssueMetadata {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ParseError(`Invalid ${METADATA_JSON_FILENAME}: ${errorMessage(error)}`);
  }

  const result = MetadataDocumentSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
    throw new ParseError(`Invalid ${METADATA_JSON_FILENAME}${where}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}
