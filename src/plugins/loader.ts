/**
 * Instantiates manifest entries and registers them.
 *
 * One failing entry is logged and skipped; the rest still load.
 */

import { ComplianceError, PluginLoadError, describeError } from '../errors.js';
import type { PluginRegistry } from './registry.js';
import type { Plugin, PluginContext } from './types.js';

export type PluginFactory = (context: PluginContext) => Plugin;

/** Entry name → factory. Entries load in insertion order. */
export type PluginManifest = Readonly<Record<string, PluginFactory>>;

export interface LoadFailure {
  entry: string;
  code: string;
  error: string;
}

export interface LoadReport {
  loaded: string[];
  disabled: string[];
  failed: LoadFailure[];
}

export interface LoadOptions {
  /** Matched against the manifest entry or the plugin's own name. */
  disabled?: readonly string[];
}

export function loadPlugins(
  registry: PluginRegistry,
  manifest: PluginManifest,
  context: PluginContext,
  options: LoadOptions = {},
): LoadReport {
  const disabled = new Set(options.disabled ?? []);
  const report: LoadReport = { loaded: [], disabled: [], failed: [] };

  for (const entry of Object.keys(manifest)) {
    try {
      const plugin = instantiate(manifest, entry, context);
      if (disabled.has(entry) || disabled.has(plugin.name)) plugin.enabled = false;
      registry.register(plugin);
      report.loaded.push(plugin.name);
      if (!plugin.enabled) report.disabled.push(plugin.name);
    } catch (err) {
      const code = err instanceof ComplianceError ? err.code : 'PLUGIN_LOAD_FAILED';
      console.error(`[plugins] Skipping ${entry}: ${describeError(err)}`);
      report.failed.push({ entry, code, error: describeError(err) });
    }
  }

  return report;
}

/** Load a single manifest entry; throws PluginLoadError on any failure. */
export function loadPluginByName(
  registry: PluginRegistry,
  manifest: PluginManifest,
  entry: string,
  context: PluginContext,
): Plugin {
  try {
    const plugin = instantiate(manifest, entry, context);
    registry.register(plugin);
    return plugin;
  } catch (err) {
    throw new PluginLoadError(entry, err);
  }
}

function instantiate(manifest: PluginManifest, entry: string, context: PluginContext): Plugin {
  if (!Object.hasOwn(manifest, entry)) throw new Error(`No manifest entry named '${entry}'`);
  return manifest[entry](context);
}
