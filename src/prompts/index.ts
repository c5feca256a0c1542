/**
 * MCP Prompt registrations: guided compliance workflows.
 * Each prompt walks the agent through the tools step-by-step.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export function registerPrompts(server: McpServer): void {

  server.prompt('assess-ai-system', 'Full EU AI Act assessment for one AI system.', {
    system_description: z.string(),
    company_location: z.string(),
  }, async (args) => ({
    messages: [{ role: 'user' as const, content: { type: 'text' as const, text: `# EU AI Act Assessment

System: "${args.system_description}"
Organization location: ${args.company_location}

**Step 1**: Screen for prohibited practices:
\`\`\`prompt
Use check_prohibited_practices with every flag that applies to the system
\`\`\`
If is_prohibited is true, stop and report the violations.

**Step 2**: Classify the risk level:
\`\`\`prompt
Use classify_ai_system_risk with system_description="${args.system_description}" and the matching risk flags
\`\`\`

**Step 3**: Determine the organization's roles:
\`\`\`prompt
Use determine_eu_ai_act_role with company_location="${args.company_location}" and the matching activity flags
\`\`\`

**Step 4**: For LIMITED-RISK systems, fetch the Article 50 disclosures with get_disclosure and review \`article50-rules://official-text\`.

**Step 5**: Summarize: risk level, roles, obligations per role, deadlines and penalties.` } }],
  }));

  server.prompt('label-generated-content', 'Label and watermark a piece of AI-generated content.', {
    content_type: z.string(),
    language: z.string().optional(),
  }, async (args) => {
    const language = args.language ?? 'en';
    return {
      messages: [{ role: 'user' as const, content: { type: 'text' as const, text: `# Label AI-Generated Content

1. Use \`label_deepfake\` with content_type="${args.content_type}" language="${language}" to get the visible Article 50(4) label
2. Use \`watermark_content\` with content_type="${args.content_type}" to get machine-readable Article 50(2) metadata
3. Check \`watermark-config://technical-standards\` for embedding guidance
4. Present the label, placement guidance and watermark metadata together.` } }],
    };
  });
}
