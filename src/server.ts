/**
 * MCP dispatch over the plugin registry.
 * Tools and resources come from enabled plugins; results are JSON text.
 * Registry changes after startup are mirrored onto the SDK handles.
 */

import { McpServer, type RegisteredTool, type RegisteredResource } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerPrompts } from './prompts/index.js';
import { TemplateStore } from './templates/index.js';
import { ScoringClient, type ScoringService } from './security/index.js';
import {
  PluginRegistry, loadPlugins, BUILTIN_PLUGINS,
  type PluginManifest, type LoadReport, type ToolDefinition, type ResourceDefinition,
} from './plugins/index.js';
import type { ComplianceConfig } from './types/index.js';

export const SERVER_NAME = 'eu-ai-act-compliance';
export const SERVER_VERSION = '0.3.0';

const SERVER_INSTRUCTIONS = `EU AI Act compliance toolkit (Regulation (EU) 2024/1689).

Start with **classify_ai_system_risk** to place a system in a risk tier, then **determine_eu_ai_act_role** to find which obligations apply to the organization. Use **check_prohibited_practices** for a full Article 5 screen.

For Article 50 transparency: **get_disclosure** (AI interaction, emotion recognition), **label_deepfake** and **get_deepfake_label_templates** (Article 50(4)), **watermark_content** (Article 50(2)).

For Article 15 security: **scan_for_prompt_injection** and **check_sensitive_file_access**. A result with is_prompt_injection: null or action: DENY_SAFE means the check could not run; treat it as unverified, never as safe.

**list_plugins** shows which plugins are loaded and enabled.`;

export interface ServerOverrides {
  templates?: TemplateStore;
  scoring?: ScoringService;
  manifest?: PluginManifest;
}

export interface ComplianceServer {
  server: McpServer;
  registry: PluginRegistry;
  report: LoadReport;
}

export function createServer(config: ComplianceConfig, overrides: ServerOverrides = {}): ComplianceServer {
  const templates = overrides.templates ?? TemplateStore.load(config.resources_path);
  const scoring = overrides.scoring ?? new ScoringClient(config.scoring);
  const registry = new PluginRegistry();

  const report = loadPlugins(
    registry,
    overrides.manifest ?? BUILTIN_PLUGINS,
    { config, templates, scoring },
    { disabled: config.plugins.disabled },
  );
  console.error(`[server] Loaded ${report.loaded.length} plugin(s), ${report.disabled.length} disabled, ${report.failed.length} failed`);

  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: { tools: {}, resources: {}, prompts: {}, logging: {} },
      instructions: SERVER_INSTRUCTIONS,
    },
  );

  const sync = exposeRegistry(server, registry);
  sync();
  registry.onChange(sync);

  server.tool(
    'list_plugins',
    'List loaded plugins with their enabled state, tools and resources.',
    async () => output({
      total_plugins: registry.size,
      plugins: registry.listPlugins(),
      total_tools: registry.toolCount,
      total_resources: registry.resourceCount,
    }),
  );

  registerPrompts(server);

  return { server, registry, report };
}

interface Exposed<D, H> {
  definition: D;
  handle: H;
}

/**
 * Returns a sync function that brings the server's tools and resources in line
 * with the registry: new entries are registered, entries of disabled plugins
 * are disabled, and removed or replaced entries are removed.
 */
function exposeRegistry(server: McpServer, registry: PluginRegistry): () => void {
  const tools = new Map<string, Exposed<ToolDefinition, RegisteredTool>>();
  const resources = new Map<string, Exposed<ResourceDefinition, RegisteredResource>>();

  return () => {
    for (const [name, entry] of tools) {
      if (registry.getTool(name) !== entry.definition) {
        entry.handle.remove();
        tools.delete(name);
      }
    }
    for (const [uri, entry] of resources) {
      if (registry.getResource(uri) !== entry.definition) {
        entry.handle.remove();
        resources.delete(uri);
      }
    }

    for (const tool of registry.allTools()) {
      if (!tools.has(tool.name)) tools.set(tool.name, { definition: tool, handle: registerTool(server, tool) });
    }
    for (const resource of registry.allResources()) {
      if (!resources.has(resource.uri)) {
        resources.set(resource.uri, { definition: resource, handle: registerResource(server, resource) });
      }
    }

    const activeTools = new Set(registry.activeTools().map((t) => t.name));
    for (const [name, { handle }] of tools) setHandleEnabled(handle, activeTools.has(name));
    const activeResources = new Set(registry.activeResources().map((r) => r.uri));
    for (const [uri, { handle }] of resources) setHandleEnabled(handle, activeResources.has(uri));
  };
}

function setHandleEnabled(handle: RegisteredTool | RegisteredResource, enabled: boolean): void {
  if (handle.enabled === enabled) return;
  if (enabled) handle.enable();
  else handle.disable();
}

function registerTool(server: McpServer, tool: ToolDefinition): RegisteredTool {
  return server.tool(tool.name, tool.description, tool.input, async (args) => output(await tool.invoke(args)));
}

function registerResource(server: McpServer, resource: ResourceDefinition): RegisteredResource {
  return server.resource(
    resource.name,
    resource.uri,
    { description: resource.description, mimeType: resource.mimeType },
    async (uri) => ({ contents: [{ uri: uri.href, mimeType: resource.mimeType, text: resource.read() }] }),
  );
}

function output(data: object) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data, null, 2) }] };
}
