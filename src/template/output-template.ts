import { ConfigError } from '../errors/custom-errors';
import type { AuthorRole, ComicFormat, IssueInfo, IssueMetadata } from '../types/comic.types';
import { sanitizeFilename } from '../utils/filename-sanitizer';

export const UNKNOWN_VALUE = 'Unknown';

/**
 * Maps an issue to its output path (relative to the working directory unless absolute)
 */
export type OutputTemplate = {
  render(issue: IssueInfo, format: ComicFormat): string;
  /** True when every field the template uses has a value */
  isComplete(metadata: IssueMetadata): boolean;
};

type Token = { type: 'text'; value: string } | { type: 'field'; name: string };

const ROLE_FIELDS: Record<string, AuthorRole> = {
  writer: 'Writer',
  penciller: 'Penciller',
  inker: 'Inker',
  colorist: 'Colorist',
  letterer: 'Letterer',
  coverartist: 'CoverArtist',
  editor: 'Editor',
};

const FIELDS: Record<string, (metadata: IssueMetadata) => string | number | undefined> = {
  title: (m) => m.title,
  series: (m) => m.series,
  publisher: (m) => m.publisher,
  issuenumber: (m) => m.issueNumber,
  year: (m) => m.year,
  month: (m) => m.month,
  day: (m) => m.day,
  source: (m) => m.source,
  ...Object.fromEntries(
    Object.entries(ROLE_FIELDS).map(([field, role]) => [
      field,
      (m: IssueMetadata) => {
        const names = (m.authors ?? []).filter((author) => author.role === role).map((author) => author.name);
        return names.length > 0 ? names.join(', ') : undefined;
      },
    ]),
  ),
};

export const TEMPLATE_FIELDS = Object.keys(FIELDS);

/**
 * Split a template into literal text and `{field}` placeholders
 *
 * `{{` and `}}` produce literal braces.
 *
 * @throws ConfigError on unknown fields or unbalanced braces
 */
export function parseTemplate(template: string): Token[] {
  const tokens: Token[] = [];
  let text = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);
    const next = template.charAt(i + 1);

    if ((char === '{' && next === '{') || (char === '}' && next === '}')) {
      text += char;
      i += 2;
      continue;
    }
    if (char === '}') {
      throw new ConfigError(`Unmatched "}" at position ${i} in template "${template}"`);
    }
    if (char !== '{') {
      text += char;
      i++;
      continue;
    }

    const end = template.indexOf('}', i);
    if (end === -1) {
      throw new ConfigError(`Unclosed "{" at position ${i} in template "${template}"`);
    }
    const name = template.slice(i + 1, end).trim().toLowerCase();
    if (!Object.hasOwn(FIELDS, name)) {
      throw new ConfigError(`Unknown template field "{${name}}". Available: ${TEMPLATE_FIELDS.join(', ')}`);
    }
    if (text) tokens.push({ type: 'text', value: text });
    tokens.push({ type: 'field', name });
    text = '';
    i = end + 1;
  }

  if (text) tokens.push({ type: 'text', value: text });
  return tokens;
}

/**
 * Default output template
 *
 * Metadata values never introduce path separators; `/` in the template itself
 * creates directories.
 */
export class PathTemplate implements OutputTemplate {
  private readonly tokens: Token[];

  /** Field names used by the template, in order of first use */
  readonly fields: readonly string[];

  constructor(readonly template: string) {
    this.tokens = parseTemplate(template);
    this.fields = [...new Set(this.tokens.flatMap((token) => (token.type === 'field' ? [token.name] : [])))];
  }

  isComplete(metadata: IssueMetadata): boolean {
    return this.fields.every((name) => {
      const value = FIELDS[name]?.(metadata);
      return value !== undefined && value !== '';
    });
  }

  render(issue: IssueInfo, format: ComicFormat): string {
    const rendered = this.tokens
      .map((token) => (token.type === 'text' ? token.value : this.fieldValue(token.name, issue.metadata)))
      .join('');

    const absolute = rendered.startsWith('/');
    const segments = rendered
      .split('/')
      .map((segment) => sanitizeFilename(segment))
      .filter((segment) => segment !== '' && segment !== '.' && segment !== '..');

    if (segments.length === 0) {
      segments.push(UNKNOWN_VALUE);
    }

    let path = `${absolute ? '/' : ''}${segments.join('/')}`;
    if (format === 'cbz' && !path.toLowerCase().endsWith('.cbz')) {
      path += '.cbz';
    }
    return path;
  }

  private fieldValue(name: string, metadata: IssueMetadata): string {
    const value = FIELDS[name]?.(metadata);
    const text = value === undefined ? '' : sanitizeFilename(String(value));
    return text || UNKNOWN_VALUE;
  }
}
