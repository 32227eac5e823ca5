/**
 * Plugin ordering: descending priority, registration order for ties.
 */

import { DEFAULT_PLUGIN_PRIORITY, type CliPlugin } from "@clidispatch/sdk";

export function pluginPriority(plugin: CliPlugin): number {
  return plugin.priority ?? DEFAULT_PLUGIN_PRIORITY;
}

/** Returns a new array; Array.prototype.sort is stable, so equal priorities keep their order. */
export function sortPlugins(plugins: readonly CliPlugin[]): CliPlugin[] {
  return [...plugins].sort((a, b) => pluginPriority(b) - pluginPriority(a));
}
