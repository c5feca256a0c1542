import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createServer } from '../src/server.js';
import { loadConfig } from '../src/config.js';
import { TemplateStore } from '../src/templates/index.js';
import { ScoringUnavailableError } from '../src/errors.js';
import type { ScoringService } from '../src/security/index.js';
import type { ComplianceConfig } from '../src/types/index.js';

const offlineScoring: ScoringService = {
  isConfigured: () => false,
  analyze: async () => { throw new ScoringUnavailableError('Scoring service is not configured'); },
};

async function connect(config: ComplianceConfig) {
  const { server, registry } = createServer(config, { scoring: offlineScoring });
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  return {
    client,
    registry,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

async function callJson(client: Client, name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (first?.type !== 'text') throw new Error(`expected text content from ${name}`);
  return JSON.parse(first.text);
}

describe('MCP server', () => {
  let config: ComplianceConfig;
  let session: Awaited<ReturnType<typeof connect>> | undefined;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    config = loadConfig({ env: {}, cwd: '/nonexistent' });
  });

  afterEach(async () => {
    await session?.close();
    session = undefined;
    vi.restoreAllMocks();
  });

  it('lists every plugin tool plus list_plugins', async () => {
    session = await connect(config);
    const { tools } = await session.client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      'check_prohibited_practices',
      'check_sensitive_file_access',
      'classify_ai_system_risk',
      'determine_eu_ai_act_role',
      'get_deepfake_label_templates',
      'get_disclosure',
      'label_deepfake',
      'list_plugins',
      'scan_for_prompt_injection',
      'watermark_content',
    ]);
  });

  it('dispatches a tool call to its plugin', async () => {
    session = await connect(config);
    const result = await callJson(session.client, 'classify_ai_system_risk', {
      system_description: 'CV screening assistant',
      use_case: 'recruitment',
    });
    expect(result).toMatchObject({ risk_level: 'HIGH-RISK', annex_reference: 'Annex III point 4(a)' });
  });

  it('applies schema defaults before the handler runs', async () => {
    session = await connect(config);
    const result = await callJson(session.client, 'get_disclosure', { disclosure_type: 'ai_interaction' });
    expect(result).toMatchObject({ language: 'en', style: 'simple', disclosure: 'You are interacting with an AI system.' });
  });

  it('returns an unverified scan when scoring is offline', async () => {
    session = await connect(config);
    const result = await callJson(session.client, 'scan_for_prompt_injection', { user_input: 'hello' });
    expect(result).toMatchObject({
      error: 'Scoring service request failed',
      details: 'Scoring service is not configured',
      is_prompt_injection: null,
    });
  });

  it('serves resources as the raw template text', async () => {
    session = await connect(config);
    const { resources } = await session.client.listResources();
    expect(resources.map((r) => r.uri).sort()).toEqual([
      'article50-rules://official-text',
      'deepfake-labels://content-labeling',
      'disclosure-templates://ai-interaction-and-emotion',
      'watermark-config://technical-standards',
    ]);

    const { contents } = await session.client.readResource({ uri: 'article50-rules://official-text' });
    const expected = TemplateStore.load(config.resources_path).rawText('article50_rules');
    expect(contents).toEqual([{ uri: 'article50-rules://official-text', mimeType: 'application/json', text: expected }]);
  });

  it('reports loaded plugins through list_plugins', async () => {
    session = await connect(config);
    const result = await callJson(session.client, 'list_plugins');
    expect(result).toMatchObject({ total_plugins: 6, total_tools: 9, total_resources: 4 });
  });

  it('hides tools of disabled plugins but still lists the plugin', async () => {
    session = await connect({ ...config, plugins: { disabled: ['security'] } });

    const { tools } = await session.client.listTools();
    const names = tools.map((t) => t.name);
    expect(names).not.toContain('scan_for_prompt_injection');
    expect(names).not.toContain('check_sensitive_file_access');

    const result = await callJson(session.client, 'list_plugins');
    expect(result).toMatchObject({
      total_plugins: 6,
      plugins: expect.arrayContaining([expect.objectContaining({ name: 'SecurityPlugin', enabled: false })]),
    });
  });

  it('follows enable and disable changes made after startup', async () => {
    session = await connect(config);

    session.registry.setEnabled('SecurityPlugin', false);
    let names = (await session.client.listTools()).tools.map((t) => t.name);
    expect(names).not.toContain('scan_for_prompt_injection');
    expect(names).not.toContain('check_sensitive_file_access');

    session.registry.setEnabled('SecurityPlugin', true);
    names = (await session.client.listTools()).tools.map((t) => t.name);
    expect(names).toContain('scan_for_prompt_injection');
    expect(names).toContain('check_sensitive_file_access');
  });

  it('exposes tools of a plugin enabled after startup', async () => {
    session = await connect({ ...config, plugins: { disabled: ['security'] } });

    session.registry.setEnabled('SecurityPlugin', true);
    const result = await callJson(session.client, 'scan_for_prompt_injection', { user_input: 'hello' });
    expect(result).toMatchObject({ is_prompt_injection: null });
  });

  it('removes the tools of an unregistered plugin', async () => {
    session = await connect(config);

    session.registry.unregister('DeepfakePlugin');
    const names = (await session.client.listTools()).tools.map((t) => t.name);
    expect(names).not.toContain('label_deepfake');
    expect(names).toContain('classify_ai_system_risk');

    const result = await callJson(session.client, 'list_plugins');
    expect(result).toMatchObject({ total_plugins: 5, total_tools: 8 });
  });

  it('registers the guided prompts', async () => {
    session = await connect(config);
    const { prompts } = await session.client.listPrompts();
    expect(prompts.map((p) => p.name).sort()).toEqual(['assess-ai-system', 'label-generated-content']);
  });
});
