/**
 * XML manifests (Maven pom.xml modules).
 *
 * `fast-xml-parser` validates the document and reads the current members.
 * The container element directly under the root is located with a tag
 * scanner and replaced in the source text; `<modules>` nested in profiles
 * are left alone.
 */
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ConfigError, ErrorCodes, ManifestParseError } from '../../../utils/errors.js';
import type { ManifestAdapter, TextManifest, TextMembersSection } from '../types.js';
import { detectEol, isRecord, lineIndentAt } from './text.js';

const DEFAULT_CHILD_INDENT = '    ';

/**
 * Comments, CDATA, processing instructions and doctype are matched so
 * their contents are never mistaken for tags.
 */
const XML_TOKEN =
  /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE[^>]*>|<(\/?)([A-Za-z_][\w.:-]*)((?:[^>"']|"[^"]*"|'[^']*')*?)(\/?)>/g;

export class XmlModulesAdapter implements ManifestAdapter<TextManifest, TextMembersSection> {
  readonly format = 'xml' as const;
  private readonly container: string;
  private readonly item: string;
  private readonly parser: XMLParser;

  /**
   * @param section - `<container>.<item>`, e.g. `modules.module`
   */
  constructor(section: string) {
    const [container, item, ...extra] = section.split('.');
    if (!container || !item || extra.length > 0) {
      throw new ConfigError(
        ErrorCodes.INVALID_CONFIG,
        `XML section must be "<container>.<item>", got "${section}"`,
        { section }
      );
    }
    this.container = container;
    this.item = item;
    this.parser = new XMLParser({
      ignoreAttributes: true,
      ignoreDeclaration: true,
      ignorePiTags: true,
      parseTagValue: false,
      trimValues: true,
      isArray: (tagName) => tagName === item,
    });
  }

  parse(content: string, filePath: string): TextManifest {
    const validation = XMLValidator.validate(content);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `Invalid XML in ${filePath}: line ${line}, column ${col}: ${msg}`,
        { filePath, line, column: col }
      );
    }

    const tree: unknown = this.parser.parse(content);
    return { filePath, source: content, tree };
  }

  locateMembersSection(document: TextManifest): TextMembersSection {
    const entries = this.readEntries(document);
    const span = this.findContainer(document.source);

    if (!span) {
      throw new ManifestParseError(
        ErrorCodes.SECTION_NOT_FOUND,
        `${document.filePath}: no <${this.container}> element under the root element`,
        { filePath: document.filePath, section: this.container }
      );
    }

    return {
      entries,
      start: span.start,
      end: span.end,
      indent: lineIndentAt(document.source, span.start),
    };
  }

  replaceMembersSection(
    document: TextManifest,
    section: TextMembersSection,
    members: readonly string[]
  ): TextManifest {
    const rendered = this.render(section.indent, members, detectEol(document.source));
    const source = document.source.slice(0, section.start) + rendered + document.source.slice(section.end);
    return this.parse(source, document.filePath);
  }

  serialize(document: TextManifest): string {
    return document.source;
  }

  private render(indent: string, members: readonly string[], eol: string): string {
    const childIndent = indent + (indent.length > 0 ? indent : DEFAULT_CHILD_INDENT);
    const lines = members.map(
      (m) => `${childIndent}<${this.item}>${escapeXml(m)}</${this.item}>`
    );
    return [`<${this.container}>`, ...lines, `${indent}</${this.container}>`].join(eol);
  }

  private readEntries(document: TextManifest): string[] {
    const { tree, filePath } = document;
    const rootName = isRecord(tree) ? Object.keys(tree).find((k) => !k.startsWith('?')) : undefined;
    const root = rootName !== undefined && isRecord(tree) ? tree[rootName] : undefined;
    const container = isRecord(root) ? root[this.container] : undefined;

    // <modules/> and <modules></modules> parse to an empty string
    if (container === '') {
      return [];
    }
    if (Array.isArray(container)) {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `${filePath}: more than one <${this.container}> element under the root element`,
        { filePath, section: this.container }
      );
    }
    if (!isRecord(container)) {
      throw new ManifestParseError(
        ErrorCodes.SECTION_NOT_FOUND,
        `${filePath}: no <${this.container}> element under the root element`,
        { filePath, section: this.container }
      );
    }

    const items = container[this.item] ?? [];
    if (!Array.isArray(items) || !items.every((i): i is string => typeof i === 'string')) {
      throw new ManifestParseError(
        ErrorCodes.MANIFEST_PARSE_ERROR,
        `${filePath}: <${this.item}> elements must contain plain text`,
        { filePath, section: this.container }
      );
    }
    return items;
  }

  /**
   * Span of the container element that is a direct child of the root.
   */
  private findContainer(source: string): { start: number; end: number } | undefined {
    let depth = 0;
    let start: number | undefined;

    XML_TOKEN.lastIndex = 0;
    for (let match = XML_TOKEN.exec(source); match !== null; match = XML_TOKEN.exec(source)) {
      const [token, closing, name, , selfClosing] = match;
      if (name === undefined) {
        continue;
      }

      if (closing) {
        depth--;
        if (depth === 1 && start !== undefined && name === this.container) {
          return { start, end: match.index + token.length };
        }
      } else if (selfClosing) {
        if (depth === 1 && name === this.container) {
          return { start: match.index, end: match.index + token.length };
        }
      } else {
        if (depth === 1 && name === this.container) {
          start = match.index;
        }
        depth++;
      }
    }

    return undefined;
  }
}

function escapeXml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
