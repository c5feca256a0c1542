/**
 * Plugin contract: a named bundle of tools and resources with lifecycle hooks.
 */

import { z, type ZodRawShape, type ZodTypeAny } from 'zod';
import type { ComplianceConfig } from '../types/index.js';
import type { TemplateStore } from '../templates/index.js';
import type { ScoringService } from '../security/index.js';

export type ToolArgs<S extends ZodRawShape> = z.objectOutputType<S, ZodTypeAny, 'strip'>;

export interface ToolDefinition {
  name: string;
  description: string;
  /** zod shape advertised to MCP clients as the input schema. */
  input: ZodRawShape;
  /** Validates `args` against `input`, then runs the handler. */
  invoke(args: unknown): Promise<object>;
}

export interface ResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
  read(): string;
}

export interface Plugin {
  readonly name: string;
  readonly description: string;
  enabled: boolean;
  getTools(): ToolDefinition[];
  getResources(): ResourceDefinition[];
  initialize(): void;
  shutdown(): void;
}

/** Shared collaborators handed to every plugin factory. */
export interface PluginContext {
  config: ComplianceConfig;
  templates: TemplateStore;
  scoring: ScoringService;
}

export interface PluginInfo {
  name: string;
  description: string;
  enabled: boolean;
  tools: string[];
  resources: string[];
}

export function defineTool<S extends ZodRawShape>(definition: {
  name: string;
  description: string;
  input: S;
  run: (args: ToolArgs<S>) => object | Promise<object>;
}): ToolDefinition {
  const schema = z.object(definition.input);
  return {
    name: definition.name,
    description: definition.description,
    input: definition.input,
    invoke: async (args) => definition.run(schema.parse(args)),
  };
}
