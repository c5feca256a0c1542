/**
 * Plugin Registry. Owns registered plugins and the flattened
 * tool-name and resource-URI tables built from them.
 *
 * Tool names and resource URIs are unique across all plugins. Registration is
 * all-or-nothing: every check and `initialize()` run before the tables change.
 * Listeners from `onChange` run after every register, unregister and setEnabled.
 */

import {
  DuplicatePluginError, DuplicateToolError, DuplicateResourceError,
  PluginNotFoundError, PluginInitializationError, PluginShutdownError,
} from '../errors.js';
import type { Plugin, PluginInfo, ToolDefinition, ResourceDefinition } from './types.js';

interface RegisteredPlugin {
  plugin: Plugin;
  /** Names captured at registration; unregister removes exactly these. */
  tools: string[];
  resources: string[];
}

interface ToolEntry { owner: string; tool: ToolDefinition }
interface ResourceEntry { owner: string; resource: ResourceDefinition }

export type RegistryListener = () => void;

export class PluginRegistry {
  private readonly plugins = new Map<string, RegisteredPlugin>();
  private readonly tools = new Map<string, ToolEntry>();
  private readonly resources = new Map<string, ResourceEntry>();
  private readonly listeners = new Set<RegistryListener>();

  register(plugin: Plugin): void {
    const name = plugin.name;
    if (this.plugins.has(name)) throw new DuplicatePluginError(name);

    const tools = plugin.getTools();
    const resources = plugin.getResources();

    const seenTools = new Set<string>();
    for (const tool of tools) {
      const owner = this.tools.get(tool.name)?.owner ?? (seenTools.has(tool.name) ? name : null);
      if (owner !== null) throw new DuplicateToolError(tool.name, owner);
      seenTools.add(tool.name);
    }

    const seenResources = new Set<string>();
    for (const resource of resources) {
      const owner = this.resources.get(resource.uri)?.owner ?? (seenResources.has(resource.uri) ? name : null);
      if (owner !== null) throw new DuplicateResourceError(resource.uri, owner);
      seenResources.add(resource.uri);
    }

    try {
      plugin.initialize();
    } catch (err) {
      throw new PluginInitializationError(name, err);
    }

    for (const tool of tools) this.tools.set(tool.name, { owner: name, tool });
    for (const resource of resources) this.resources.set(resource.uri, { owner: name, resource });
    this.plugins.set(name, {
      plugin,
      tools: tools.map((t) => t.name),
      resources: resources.map((r) => r.uri),
    });
    this.changed();
  }

  /** Shuts the plugin down and drops its entries, even when shutdown throws. */
  unregister(name: string): void {
    const entry = this.plugins.get(name);
    if (!entry) throw new PluginNotFoundError(name);

    try {
      entry.plugin.shutdown();
    } catch (err) {
      this.detach(name, entry);
      throw new PluginShutdownError(name, err);
    }
    this.detach(name, entry);
  }

  /** Unregisters everything in reverse registration order. Returns the failures. */
  shutdownAll(): PluginShutdownError[] {
    const failures: PluginShutdownError[] = [];
    for (const name of [...this.plugins.keys()].reverse()) {
      try {
        this.unregister(name);
      } catch (err) {
        if (!(err instanceof PluginShutdownError)) throw err;
        failures.push(err);
      }
    }
    return failures;
  }

  getTool(name: string): ToolDefinition | undefined {
    return this.tools.get(name)?.tool;
  }

  getResource(uri: string): ResourceDefinition | undefined {
    return this.resources.get(uri)?.resource;
  }

  getPlugin(name: string): Plugin | undefined {
    return this.plugins.get(name)?.plugin;
  }

  setEnabled(name: string, enabled: boolean): void {
    const entry = this.plugins.get(name);
    if (!entry) throw new PluginNotFoundError(name);
    entry.plugin.enabled = enabled;
    this.changed();
  }

  /** Returns the unsubscribe function. */
  onChange(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  /** Every registered tool, enabled or not, in registration order. */
  allTools(): ToolDefinition[] {
    return [...this.tools.values()].map((e) => e.tool);
  }

  allResources(): ResourceDefinition[] {
    return [...this.resources.values()].map((e) => e.resource);
  }

  /** Tools whose owning plugin is enabled, in registration order. */
  activeTools(): ToolDefinition[] {
    return [...this.tools.values()]
      .filter((e) => this.isEnabled(e.owner))
      .map((e) => e.tool);
  }

  activeResources(): ResourceDefinition[] {
    return [...this.resources.values()]
      .filter((e) => this.isEnabled(e.owner))
      .map((e) => e.resource);
  }

  listPlugins(): PluginInfo[] {
    return [...this.plugins.values()].map((e) => ({
      name: e.plugin.name,
      description: e.plugin.description,
      enabled: e.plugin.enabled,
      tools: [...e.tools],
      resources: [...e.resources],
    }));
  }

  get size(): number { return this.plugins.size; }
  get toolCount(): number { return this.tools.size; }
  get resourceCount(): number { return this.resources.size; }

  private isEnabled(owner: string): boolean {
    return this.plugins.get(owner)?.plugin.enabled === true;
  }

  private detach(name: string, entry: RegisteredPlugin): void {
    for (const tool of entry.tools) this.tools.delete(tool);
    for (const uri of entry.resources) this.resources.delete(uri);
    this.plugins.delete(name);
    this.changed();
  }

  private changed(): void {
    for (const listener of this.listeners) listener();
  }
}
