/**
 * go.work manifests.
 *
 * The file is parsed into directives; the contiguous run of `use`
 * directives (block or single-line) is the members section and is
 * rewritten as a single gofmt-style `use ( ... )` block.
 */
import { ErrorCodes, ManifestParseError } from '../../../utils/errors.js';
import type { ManifestAdapter, TextManifest, TextMembersSection } from '../types.js';
import { detectEol } from './text.js';

const KNOWN_DIRECTIVES = new Set(['go', 'toolchain', 'godebug', 'use', 'replace']);

export interface GoWorkDirective {
  keyword: string;
  /** One argument per line; a single-line directive has exactly one */
  args: string[];
  block: boolean;
  /** Offset of the keyword */
  start: number;
  /** Offset just past the directive (before the trailing newline) */
  end: number;
  /** Leading whitespace of the directive line */
  indent: string;
}

export interface GoWorkFile {
  directives: GoWorkDirective[];
}

export type GoWorkManifest = TextManifest<GoWorkFile>;

export class GoWorkAdapter implements ManifestAdapter<GoWorkManifest, TextMembersSection> {
  readonly format = 'go-work' as const;

  parse(content: string, filePath: string): GoWorkManifest {
    return { filePath, source: content, tree: parseGoWork(content, filePath) };
  }

  locateMembersSection(document: GoWorkManifest): TextMembersSection {
    const { directives } = document.tree;
    const first = directives.findIndex((d) => d.keyword === 'use');

    if (first === -1) {
      throw new ManifestParseError(
        ErrorCodes.SECTION_NOT_FOUND,
        `${document.filePath}: no use directive`,
        { filePath: document.filePath, section: 'use' }
      );
    }

    let last = first;
    while (last + 1 < directives.length && directives[last + 1].keyword === 'use') {
      last++;
    }
    if (directives.slice(last + 1).some((d) => d.keyword === 'use')) {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `${document.filePath}: use directives must be contiguous`,
        { filePath: document.filePath, section: 'use' }
      );
    }

    const run = directives.slice(first, last + 1);
    return {
      entries: run.flatMap((d) => d.args),
      start: run[0].start,
      end: run[run.length - 1].end,
      indent: run[0].indent,
    };
  }

  replaceMembersSection(
    document: GoWorkManifest,
    section: TextMembersSection,
    members: readonly string[]
  ): GoWorkManifest {
    const eol = detectEol(document.source);
    const rendered =
      members.length === 0
        ? 'use ()'
        : ['use (', ...members.map((m) => `${section.indent}\t${formatPath(m)}`), `${section.indent})`].join(eol);
    const source = document.source.slice(0, section.start) + rendered + document.source.slice(section.end);
    return this.parse(source, document.filePath);
  }

  serialize(document: GoWorkManifest): string {
    return document.source;
  }
}

/**
 * Parse go.work text into directives. Comments are stripped; argument
 * values are unquoted.
 */
export function parseGoWork(content: string, filePath: string): GoWorkFile {
  const directives: GoWorkDirective[] = [];
  let open: GoWorkDirective | undefined;
  let offset = 0;
  let lineNo = 0;

  for (const rawLine of content.split('\n')) {
    lineNo++;
    const lineStart = offset;
    offset += rawLine.length + 1;

    const line = stripComment(rawLine.replace(/\r$/, ''));
    const trimmed = line.trim();
    if (trimmed === '') {
      continue;
    }
    const indent = /^[ \t]*/.exec(line)?.[0] ?? '';
    const lineEnd = lineStart + line.trimEnd().length;

    if (open) {
      if (trimmed === ')') {
        open.end = lineEnd;
        directives.push(open);
        open = undefined;
      } else {
        open.args.push(readArg(trimmed, open.keyword, filePath, lineNo));
      }
      continue;
    }

    const match = /^([a-z]+)(?:\s+(.*))?$/.exec(trimmed);
    if (!match || !KNOWN_DIRECTIVES.has(match[1])) {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `Invalid go.work in ${filePath}: line ${lineNo}: unknown directive "${trimmed.split(/\s/)[0]}"`,
        { filePath, line: lineNo }
      );
    }

    const keyword = match[1];
    const rest = (match[2] ?? '').trim();
    const directive: GoWorkDirective = {
      keyword,
      args: [],
      block: false,
      start: lineStart + indent.length,
      end: lineEnd,
      indent,
    };

    if (rest === '(') {
      directive.block = true;
      open = directive;
    } else if (rest === '()') {
      directive.block = true;
      directives.push(directive);
    } else if (rest === '') {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `Invalid go.work in ${filePath}: line ${lineNo}: ${keyword} directive needs an argument`,
        { filePath, line: lineNo }
      );
    } else {
      directive.args.push(readArg(rest, keyword, filePath, lineNo));
      directives.push(directive);
    }
  }

  if (open) {
    throw new ManifestParseError(
      ErrorCodes.MANIFEST_PARSE_ERROR,
      `Invalid go.work in ${filePath}: unterminated ${open.keyword} block`,
      { filePath }
    );
  }

  return { directives };
}

/**
 * `use` arguments are a single path, possibly quoted. Other directives
 * keep their text as-is.
 */
function readArg(text: string, keyword: string, filePath: string, lineNo: number): string {
  if (keyword !== 'use') {
    return text;
  }
  const quoted = /^"((?:[^"\\]|\\.)*)"$|^`([^`]*)`$/.exec(text);
  if (quoted) {
    return quoted[1] !== undefined ? quoted[1].replace(/\\(.)/g, '$1') : quoted[2];
  }
  if (/\s/.test(text)) {
    throw new ManifestParseError(
      ErrorCodes.MANIFEST_PARSE_ERROR,
      `Invalid go.work in ${filePath}: line ${lineNo}: unexpected text after use path`,
      { filePath, line: lineNo }
    );
  }
  return text;
}

/** Drop a `//` comment that is not inside a quoted string. */
function stripComment(line: string): string {
  let quote: string | undefined;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote) {
      if (ch === '\\' && quote === '"') {
        i++;
      } else if (ch === quote) {
        quote = undefined;
      }
    } else if (ch === '"' || ch === '`') {
      quote = ch;
    } else if (ch === '/' && line[i + 1] === '/') {
      return line.slice(0, i);
    }
  }
  return line;
}

function formatPath(path: string): string {
  return /[\s"`]/.test(path) || path === '' ? JSON.stringify(path) : path;
}
