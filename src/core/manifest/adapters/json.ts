/**
 * JSON manifests (package.json workspaces).
 *
 * The document is parsed, the array at the section path replaced, and the
 * whole document re-serialized. Key order, indentation, line endings and the
 * trailing newline of the original are kept.
 */
import { ConfigError, ErrorCodes, ManifestParseError } from '../../../utils/errors.js';
import type { ManifestAdapter, MembersSection } from '../types.js';
import { detectEol, isRecord, readStringArray } from './text.js';

export interface JsonManifest {
  filePath: string;
  data: Record<string, unknown>;
  indent: string;
  eol: '\n' | '\r\n';
  trailingNewline: boolean;
}

const DEFAULT_INDENT = '  ';

export class JsonArrayAdapter implements ManifestAdapter<JsonManifest> {
  readonly format = 'json' as const;
  private readonly path: string[];

  /**
   * @param section - dotted key path, e.g. `workspaces` or `workspaces.packages`
   */
  constructor(section: string) {
    this.path = section.split('.').filter((s) => s.length > 0);
    if (this.path.length === 0) {
      throw new ConfigError(ErrorCodes.INVALID_CONFIG, `JSON section path is empty`, { section });
    }
  }

  parse(content: string, filePath: string): JsonManifest {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }

    if (!isRecord(data)) {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `${filePath}: top-level value must be an object`,
        { filePath }
      );
    }

    return {
      filePath,
      data,
      indent: detectIndent(content),
      eol: detectEol(content),
      trailingNewline: /\r?\n$/.test(content),
    };
  }

  locateMembersSection(document: JsonManifest): MembersSection {
    let node: unknown = document.data;
    for (const key of this.path) {
      node = isRecord(node) ? node[key] : undefined;
    }

    if (node === undefined) {
      throw new ManifestParseError(
        ErrorCodes.SECTION_NOT_FOUND,
        `${document.filePath}: no "${this.path.join('.')}" array`,
        { filePath: document.filePath, section: this.path.join('.') }
      );
    }

    const entries = readStringArray(node);
    if (!entries) {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `${document.filePath}: "${this.path.join('.')}" must be an array of strings`,
        { filePath: document.filePath, section: this.path.join('.') }
      );
    }

    return { entries };
  }

  replaceMembersSection(
    document: JsonManifest,
    _section: MembersSection,
    members: readonly string[]
  ): JsonManifest {
    return { ...document, data: setAtPath(document.data, this.path, [...members]) };
  }

  serialize(document: JsonManifest): string {
    let text = JSON.stringify(document.data, null, document.indent);
    if (document.eol === '\r\n') {
      text = text.replace(/\n/g, '\r\n');
    }
    return document.trailingNewline ? text + document.eol : text;
  }
}

/**
 * Copy `obj` with the value at `path` replaced.
 * Spreading keeps every key in its original position.
 */
function setAtPath(
  obj: Record<string, unknown>,
  path: readonly string[],
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path;
  if (rest.length === 0) {
    return { ...obj, [head]: value };
  }
  const child = obj[head];
  return { ...obj, [head]: setAtPath(isRecord(child) ? child : {}, rest, value) };
}

/**
 * Indentation of the first indented line, or two spaces.
 */
function detectIndent(content: string): string {
  const match = /^([ \t]+)\S/m.exec(content);
  return match ? match[1] : DEFAULT_INDENT;
}
