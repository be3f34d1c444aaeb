import { describe, it, expect } from 'vitest';
import { TomlArrayAdapter } from '../../../../../src/core/manifest/adapters/toml.js';
import { ConfigError, ErrorCodes, ManifestParseError } from '../../../../../src/utils/errors.js';

const CARGO_PATH = '/repo/clients/rust/Cargo.toml';

function rewrite(section: string, content: string, members: string[]): string {
  const adapter = new TomlArrayAdapter(section);
  const document = adapter.parse(content, CARGO_PATH);
  return adapter.serialize(adapter.replaceMembersSection(document, adapter.locateMembersSection(document), members));
}

describe('TomlArrayAdapter', () => {
  describe('locateMembersSection', () => {
    it('should read the current members', () => {
      const adapter = new TomlArrayAdapter('workspace.members');
      const document = adapter.parse('[workspace]\nmembers = ["core", "idp"]\n', CARGO_PATH);

      const section = adapter.locateMembersSection(document);

      expect(section.entries).toEqual(['core', 'idp']);
      expect(section.keyToken).toBe('members');
      expect(section.indent).toBe('');
    });

    it('should report a missing members key', () => {
      const adapter = new TomlArrayAdapter('workspace.members');
      const document = adapter.parse('[workspace]\nresolver = "2"\n', CARGO_PATH);

      expect(() => adapter.locateMembersSection(document)).toThrow(
        `${CARGO_PATH}: no "members" array in [workspace]`
      );
    });

    it('should reject members that are not strings', () => {
      const adapter = new TomlArrayAdapter('workspace.members');
      const document = adapter.parse('[workspace]\nmembers = [1, 2]\n', CARGO_PATH);

      try {
        adapter.locateMembersSection(document);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ManifestParseError);
        expect(error).toMatchObject({
          code: ErrorCodes.MANIFEST_PARSE_ERROR,
          message: `${CARGO_PATH}: "workspace.members" must be an array of strings`,
        });
      }
    });

    it('should require a table header for the members array', () => {
      const adapter = new TomlArrayAdapter('workspace.members');
      const document = adapter.parse('workspace = { members = ["core"] }\n', CARGO_PATH);

      expect(() => adapter.locateMembersSection(document)).toThrow(
        `${CARGO_PATH}: "members" must be declared under a [workspace] header`
      );
    });
  });

  describe('replaceMembersSection', () => {
    it('should rewrite only the members array', () => {
      const content = [
        '# Workspace root',
        '[workspace]',
        'resolver = "2"',
        'members = [',
        '    "core",',
        '    "idp",',
        '] # keep sorted',
        '',
        '[workspace.package]',
        'version = "0.1.0"',
        '',
      ].join('\n');

      expect(rewrite('workspace.members', content, ['billing', 'core', 'idp'])).toBe(
        [
          '# Workspace root',
          '[workspace]',
          'resolver = "2"',
          'members = [',
          '    "billing",',
          '    "core",',
          '    "idp",',
          '] # keep sorted',
          '',
          '[workspace.package]',
          'version = "0.1.0"',
          '',
        ].join('\n')
      );
    });

    it('should find a nested table and keep the key indentation', () => {
      const content = '[project]\nname = "clients"\n\n[tool.uv.workspace]\n  members = ["core"]\n';

      expect(rewrite('tool.uv.workspace.members', content, ['core', 'idp'])).toBe(
        '[project]\nname = "clients"\n\n[tool.uv.workspace]\n  members = [\n      "core",\n      "idp",\n  ]\n'
      );
    });

    it('should not be confused by brackets inside strings', () => {
      const content = '[workspace]\nmembers = ["x]y"]\nexclude = ["old"]\n';

      expect(rewrite('workspace.members', content, ['core'])).toBe(
        '[workspace]\nmembers = [\n    "core",\n]\nexclude = ["old"]\n'
      );
    });

    it('should handle TOML 1.0 dotted keys and mixed arrays around the members array', () => {
      const content = [
        '[workspace]',
        'resolver = "2"',
        'metadata.matrix = [',
        '    [1, "linux"],',
        '    [2, "macos"],',
        ']',
        'members = ["core"]',
        '',
        '[workspace.dependencies]',
        'prost.version = "0.13"',
        'tokio = { version = "1", features = ["full"] }',
        '',
      ].join('\n');

      expect(rewrite('workspace.members', content, ['billing', 'core'])).toBe(
        [
          '[workspace]',
          'resolver = "2"',
          'metadata.matrix = [',
          '    [1, "linux"],',
          '    [2, "macos"],',
          ']',
          'members = [',
          '    "billing",',
          '    "core",',
          ']',
          '',
          '[workspace.dependencies]',
          'prost.version = "0.13"',
          'tokio = { version = "1", features = ["full"] }',
          '',
        ].join('\n')
      );
    });

    it('should not take a dotted key ending in the member key for the members array', () => {
      const content = '[workspace]\nextra.members = ["old"]\nmembers = ["core"]\n';

      expect(rewrite('workspace.members', content, ['idp'])).toBe(
        '[workspace]\nextra.members = ["old"]\nmembers = [\n    "idp",\n]\n'
      );
    });

    it('should keep CRLF line endings', () => {
      expect(rewrite('workspace.members', '[workspace]\r\nmembers = ["core"]\r\n', ['billing', 'core'])).toBe(
        '[workspace]\r\nmembers = [\r\n    "billing",\r\n    "core",\r\n]\r\n'
      );
    });

    it('should render an empty list inline', () => {
      expect(rewrite('workspace.members', '[workspace]\nmembers = ["core"]\n', [])).toBe(
        '[workspace]\nmembers = []\n'
      );
    });
  });

  describe('parse', () => {
    it('should wrap TOML syntax errors', () => {
      const adapter = new TomlArrayAdapter('workspace.members');

      try {
        adapter.parse('[workspace\nmembers = [', CARGO_PATH);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ManifestParseError);
        expect(error).toMatchObject({ code: ErrorCodes.MANIFEST_PARSE_ERROR });
        expect(error instanceof Error ? error.message : '').toMatch(/^Invalid TOML in \/repo\/clients\/rust\/Cargo\.toml: /);
      }
    });
  });

  it('should reject a section without a table', () => {
    expect(() => new TomlArrayAdapter('members')).toThrow(ConfigError);
  });
});
