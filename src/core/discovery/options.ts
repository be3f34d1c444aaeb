import type { Config } from '../config/schema.js';
import type { DiscoveryOptions } from './types.js';

/**
 * Map the `discovery` config section onto discoverer options.
 */
export function discoveryOptionsFromConfig(config: Config): DiscoveryOptions {
  return {
    hiddenPrefix: config.discovery.hidden_prefix,
    exclude: config.discovery.exclude,
    sort: config.discovery.sort,
  };
}
