/**
 * Manifest adapter registry.
 */
import type { ManifestFormat } from '../../config/schema.js';
import type { ManifestAdapter, MembersSection } from '../types.js';
import { GoWorkAdapter } from './go-work.js';
import { JsonArrayAdapter } from './json.js';
import { TomlArrayAdapter } from './toml.js';
import { XmlModulesAdapter } from './xml.js';

/**
 * Callback receiving whichever adapter fits a format. Generic so the
 * adapter's document and section types stay paired inside the callback.
 */
export type AdapterCallback<R> = <TDocument, TSection extends MembersSection>(
  adapter: ManifestAdapter<TDocument, TSection>
) => R;

/**
 * Build the adapter for `format` and hand it to `use`.
 */
export function withManifestAdapter<R>(
  format: ManifestFormat,
  section: string,
  use: AdapterCallback<R>
): R {
  switch (format) {
    case 'toml':
      return use(new TomlArrayAdapter(section));
    case 'xml':
      return use(new XmlModulesAdapter(section));
    case 'json':
      return use(new JsonArrayAdapter(section));
    case 'go-work':
      return use(new GoWorkAdapter());
  }
}

export { TomlArrayAdapter, type TomlSection } from './toml.js';
export { XmlModulesAdapter } from './xml.js';
export { JsonArrayAdapter, type JsonManifest } from './json.js';
export { GoWorkAdapter, parseGoWork, type GoWorkFile, type GoWorkDirective, type GoWorkManifest } from './go-work.js';
