/**
 * TOML manifests (Cargo.toml workspaces, pyproject.toml uv workspaces).
 *
 * The document is parsed with `smol-toml` (TOML 1.0) to read the current members; the
 * array literal itself is located in the source text and spliced, so
 * comments, key order and formatting elsewhere stay byte-identical.
 */
import { parse as parseToml } from 'smol-toml';
import { ConfigError, ErrorCodes, ManifestParseError } from '../../../utils/errors.js';
import type { ManifestAdapter, TextManifest, TextMembersSection } from '../types.js';
import { detectEol, escapeRegExp, isRecord, readStringArray } from './text.js';

const ELEMENT_INDENT = '    ';

const KEY_PART = `(?:[A-Za-z0-9_-]+|"[^"\\n]*"|'[^'\\n]*')`;

/** `key = ` at the start of a line. Bare, quoted or dotted key. */
const KEY_VALUE = new RegExp(`^([ \\t]*)(${KEY_PART}(?:[ \\t]*\\.[ \\t]*${KEY_PART})*)[ \\t]*=[ \\t]*`);
const SINGLE_KEY = new RegExp(`^${KEY_PART}$`);

export interface TomlSection extends TextMembersSection {
  /** Key token as written (keeps quoting) */
  keyToken: string;
}

export class TomlArrayAdapter implements ManifestAdapter<TextManifest, TomlSection> {
  readonly format = 'toml' as const;
  private readonly table: string[];
  private readonly key: string;

  /**
   * @param section - dotted path `<table>.<key>`, e.g. `workspace.members`
   */
  constructor(section: string) {
    const segments = section.split('.').filter((s) => s.length > 0);
    const key = segments.pop();
    if (!key || segments.length === 0) {
      throw new ConfigError(
        ErrorCodes.INVALID_CONFIG,
        `TOML section must be "<table>.<key>", got "${section}"`,
        { section }
      );
    }
    this.table = segments;
    this.key = key;
  }

  parse(content: string, filePath: string): TextManifest {
    try {
      return { filePath, source: content, tree: parseToml(content) };
    } catch (error) {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `Invalid TOML in ${filePath}: ${describeTomlError(error)}`,
        { filePath }
      );
    }
  }

  locateMembersSection(document: TextManifest): TomlSection {
    const tableLabel = `[${this.table.join('.')}]`;
    const entries = this.readEntries(document, tableLabel);

    const header = new RegExp(
      `^[ \\t]*\\[[ \\t]*${this.table.map(escapeRegExp).join('[ \\t]*\\.[ \\t]*')}[ \\t]*\\][ \\t]*(?:#[^\\n]*)?\\r?$`,
      'm'
    );
    const headerMatch = header.exec(document.source);
    if (!headerMatch) {
      throw new ManifestParseError(
        ErrorCodes.SECTION_NOT_FOUND,
        `${document.filePath}: "${this.key}" must be declared under a ${tableLabel} header`,
        { filePath: document.filePath, section: this.sectionLabel() }
      );
    }

    const source = document.source;
    let pos = nextLineStart(source, headerMatch.index + headerMatch[0].length);

    while (pos < source.length) {
      const lineEnd = lineEndAt(source, pos);
      const line = source.slice(pos, lineEnd);

      // Next table or array-of-tables header ends this table
      if (line.trimStart().startsWith('[')) {
        break;
      }

      const kv = KEY_VALUE.exec(line);
      if (kv) {
        const valueStart = pos + kv[0].length;
        const valueEnd = skipValue(source, valueStart, document.filePath);
        if (SINGLE_KEY.test(kv[2]) && unquoteKey(kv[2]) === this.key && source[valueStart] === '[') {
          return {
            entries,
            start: pos + kv[1].length,
            end: valueEnd,
            indent: kv[1],
            keyToken: kv[2],
          };
        }
        pos = nextLineStart(source, valueEnd);
        continue;
      }

      pos = nextLineStart(source, lineEnd);
    }

    throw new ManifestParseError(
      ErrorCodes.SECTION_NOT_FOUND,
      `${document.filePath}: "${this.key}" must be written as "${this.key} = [...]" directly under ${tableLabel}`,
      { filePath: document.filePath, section: this.sectionLabel() }
    );
  }

  replaceMembersSection(
    document: TextManifest,
    section: TomlSection,
    members: readonly string[]
  ): TextManifest {
    const rendered = renderArray(section.keyToken, section.indent, members, detectEol(document.source));
    const source = document.source.slice(0, section.start) + rendered + document.source.slice(section.end);
    return this.parse(source, document.filePath);
  }

  serialize(document: TextManifest): string {
    return document.source;
  }

  private sectionLabel(): string {
    return [...this.table, this.key].join('.');
  }

  private readEntries(document: TextManifest, tableLabel: string): string[] {
    let node: unknown = document.tree;
    for (const segment of this.table) {
      node = isRecord(node) ? node[segment] : undefined;
    }
    const value = isRecord(node) ? node[this.key] : undefined;

    if (value === undefined) {
      throw new ManifestParseError(
        ErrorCodes.SECTION_NOT_FOUND,
        `${document.filePath}: no "${this.key}" array in ${tableLabel}`,
        { filePath: document.filePath, section: this.sectionLabel() }
      );
    }

    const entries = readStringArray(value);
    if (!entries) {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `${document.filePath}: "${this.sectionLabel()}" must be an array of strings`,
        { filePath: document.filePath, section: this.sectionLabel() }
      );
    }
    return entries;
  }
}

function renderArray(keyToken: string, indent: string, members: readonly string[], eol: string): string {
  if (members.length === 0) {
    return `${keyToken} = []`;
  }
  const lines = members.map((m) => `${indent}${ELEMENT_INDENT}${JSON.stringify(m)},`);
  return [`${keyToken} = [`, ...lines, `${indent}]`].join(eol);
}

function unquoteKey(token: string): string {
  if ((token.startsWith('"') && token.endsWith('"')) || (token.startsWith("'") && token.endsWith("'"))) {
    return token.slice(1, -1);
  }
  return token;
}

function lineEndAt(source: string, pos: number): number {
  const idx = source.indexOf('\n', pos);
  return idx === -1 ? source.length : idx;
}

function nextLineStart(source: string, pos: number): number {
  return Math.min(lineEndAt(source, pos) + 1, source.length);
}

/**
 * Return the offset just past the value starting at `start`.
 * Arrays and inline tables may span lines; strings and comments inside
 * them are skipped so brackets in strings don't count.
 */
function skipValue(source: string, start: number, filePath: string): number {
  const open = source[start];
  if (open !== '[' && open !== '{') {
    if (source.startsWith('"""', start) || source.startsWith("'''", start)) {
      return skipString(source, start, filePath);
    }
    return lineEndAt(source, start);
  }

  let depth = 0;
  let i = start;
  while (i < source.length) {
    const ch = source[i];
    if (ch === '[' || ch === '{') {
      depth++;
      i++;
    } else if (ch === ']' || ch === '}') {
      depth--;
      i++;
      if (depth === 0) {
        return i;
      }
    } else if (ch === '"' || ch === "'") {
      i = skipString(source, i, filePath);
    } else if (ch === '#') {
      i = lineEndAt(source, i);
    } else {
      i++;
    }
  }

  throw new ManifestParseError(
    ErrorCodes.MANIFEST_PARSE_ERROR,
    `${filePath}: unterminated array at line ${lineNumberAt(source, start)}`,
    { filePath }
  );
}

/** Offset just past the string literal starting at `start`. */
function skipString(source: string, start: number, filePath: string): number {
  const quote = source[start];
  const multiline = source.startsWith(quote.repeat(3), start);
  const delimiter = multiline ? quote.repeat(3) : quote;
  let i = start + delimiter.length;

  while (i < source.length) {
    if (quote === '"' && source[i] === '\\') {
      i += 2;
      continue;
    }
    if (source.startsWith(delimiter, i)) {
      return i + delimiter.length;
    }
    i++;
  }

  throw new ManifestParseError(
    ErrorCodes.MANIFEST_PARSE_ERROR,
    `${filePath}: unterminated string at line ${lineNumberAt(source, start)}`,
    { filePath }
  );
}

function lineNumberAt(source: string, offset: number): number {
  return source.slice(0, offset).split('\n').length;
}

function describeTomlError(error: unknown): string {
  if (error instanceof Error) {
    const line = 'line' in error && typeof error.line === 'number' ? error.line : undefined;
    const column = 'column' in error && typeof error.column === 'number' ? error.column : undefined;
    // smol-toml appends a code frame after the first line
    const message = error.message.split('\n')[0];
    return line !== undefined ? `line ${line}, column ${column ?? 0}: ${message}` : message;
  }
  return String(error);
}
