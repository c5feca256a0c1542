export { PluginRegistry } from './registry.js';
export type { RegistryListener } from './registry.js';
export { BasePlugin } from './base.js';
export { defineTool } from './types.js';
export type { Plugin, PluginContext, PluginInfo, ToolDefinition, ResourceDefinition, ToolArgs } from './types.js';
export { loadPlugins, loadPluginByName } from './loader.js';
export type { PluginFactory, PluginManifest, LoadReport, LoadFailure, LoadOptions } from './loader.js';
export {
  BUILTIN_PLUGINS,
  RiskClassificationPlugin, RoleDeterminationPlugin, TransparencyPlugin,
  DeepfakePlugin, WatermarkingPlugin, SecurityPlugin,
} from './builtin/index.js';
