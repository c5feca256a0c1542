import type { Plugin, ToolDefinition, ResourceDefinition } from './types.js';

/** Defaults for the optional parts of the plugin contract. */
export abstract class BasePlugin implements Plugin {
  abstract readonly name: string;
  abstract readonly description: string;
  enabled = true;

  getTools(): ToolDefinition[] {
    return [];
  }

  getResources(): ResourceDefinition[] {
    return [];
  }

  initialize(): void {
    // no setup by default
  }

  shutdown(): void {
    // no teardown by default
  }
}
