import type { ErrorKind } from '../errors/custom-errors';
import { createEnum } from '../utils/create-enum';

const comicFormatValues = createEnum(['cbz', 'dir'] as const);

/**
 * Output artifact format
 */
export type ComicFormat = typeof comicFormatValues.type;

export const ComicFormat = comicFormatValues.object;

export const ComicFormatSchema = comicFormatValues.schema;

const authorRoleValues = createEnum([
  'Writer',
  'Penciller',
  'Inker',
  'Colorist',
  'Letterer',
  'CoverArtist',
  'Editor',
  'Other',
] as const);

export type AuthorRole = typeof authorRoleValues.type;

export const AuthorRoleSchema = authorRoleValues.schema;

/**
 * Parsed handle identifying a series or a single issue on a platform
 */
export type SourceUrl = {
  readonly platform: string;
  readonly kind: 'series' | 'issue';
  /** Platform-specific id (may contain slashes) */
  readonly id: string;
  /** URL the handle was resolved from */
  readonly url: string;
};

export type Author = {
  name: string;
  role: AuthorRole;
};

export type ReadingDirection = 'ltr' | 'rtl';

/**
 * Issue metadata. Every field is optional since platforms expose different subsets.
 */
export type IssueMetadata = {
  title?: string;
  series?: string;
  publisher?: string;
  issueNumber?: number;
  year?: number;
  month?: number;
  day?: number;
  description?: string;
  authors?: Author[];
  readingDirection?: ReadingDirection;
  /** Display name of the platform */
  source?: string;
  pageCount?: number;
};

/**
 * Issue discovered on a platform
 */
export type IssueInfo = {
  ref: SourceUrl;
  /** Platform ordering key (episode number, chapter id, list position) */
  order: number;
  metadata: IssueMetadata;
};

/**
 * Series with its issue references
 */
export type SeriesInfo = {
  ref: SourceUrl;
  title: string;
  /** True when the platform marks the series as finished */
  ended: boolean;
  issues: IssueInfo[];
};

/**
 * How raw page bytes are turned into an image
 */
export type DecodeScheme =
  | { type: 'identity' }
  | { type: 'base64' }
  | { type: 'xor'; key: Uint8Array }
  | { type: 'aes-cbc'; key: Uint8Array; iv: Uint8Array }
  | { type: 'size-prefixed-aes'; key: Uint8Array };

/**
 * Instructions for fetching one page. Only valid while its issue is downloading.
 */
export type PageHandle = {
  issueId: string;
  /** Zero-based reading position, contiguous within an issue */
  index: number;
  url: string;
  headers?: Record<string, string>;
  decode: DecodeScheme;
};

/**
 * Decoded page image
 */
export type PageData = {
  bytes: Uint8Array;
  extension: string;
  mimeType: string;
};

/**
 * Outcome of one issue (or of a target that failed before any issue was known)
 */
export type DownloadResult =
  | { status: 'success'; issue: IssueInfo; path: string }
  | { status: 'skipped'; issue: IssueInfo; path: string; reason: string }
  | { status: 'failed'; issue?: IssueInfo; target: string; kind: ErrorKind; message: string };

/**
 * Label used in logs and failure reports
 */
export function describeIssue(issue: IssueInfo): string {
  const { title, series } = issue.metadata;
  if (title && series && !title.includes(series)) {
    return `${series} - ${title}`;
  }
  return title ?? series ?? `${issue.ref.platform}:${issue.ref.id}`;
}

/**
 * Map a platform credit label ("Inks", "Cover Artist", ...) to a role
 */
export function parseAuthorRole(label: string): AuthorRole {
  const lower = label.trim().toLowerCase();
  if (lower.includes('cover')) {
    return 'CoverArtist';
  }
  switch (lower) {
    case 'writer':
      return 'Writer';
    case 'penciller':
    case 'penciler':
      return 'Penciller';
    case 'inks':
    case 'inker':
      return 'Inker';
    case 'colors':
    case 'colorist':
      return 'Colorist';
    case 'letterer':
      return 'Letterer';
    case 'editor':
      return 'Editor';
    default:
      return 'Other';
  }
}

/**
 * Read year, month and day from a date that starts with `YYYY-MM-DD`
 */
export function parseReleaseDate(text: string): Pick<IssueMetadata, 'year' | 'month' | 'day'> {
  const match = /^(\d{4})-(\d{1,2})-(\d{1,2})/.exec(text.trim());
  if (!match?.[1] || !match[2] || !match[3]) {
    return {};
  }
  return {
    year: Number.parseInt(match[1], 10),
    month: Number.parseInt(match[2], 10),
    day: Number.parseInt(match[3], 10),
  };
}
