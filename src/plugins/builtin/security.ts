/**
 * Article 15 cybersecurity checks via the scoring service.
 *
 * Credentials come from configuration unless passed per call.
 */

import { z } from 'zod';
import { BasePlugin } from '../base.js';
import { defineTool, type ToolDefinition } from '../types.js';
import { scanForPromptInjection, checkSensitiveFileAccess, type ScoringService } from '../../security/index.js';

const credentials = {
  api_token: z.string().min(1).optional().describe('Scoring service bearer token; defaults to SCORING_API_TOKEN'),
  analysis_id: z.string().min(1).optional().describe('Scoring service analysis ID; defaults to SCORING_ANALYSIS_ID'),
};

export class SecurityPlugin extends BasePlugin {
  readonly name = 'SecurityPlugin';
  readonly description = 'Provides EU AI Act Article 15 cybersecurity tools backed by the scoring service';

  constructor(private readonly scoring: ScoringService) {
    super();
  }

  getTools(): ToolDefinition[] {
    return [
      defineTool({
        name: 'scan_for_prompt_injection',
        description: 'Scan user input for prompt injection attacks. A failed scan returns is_prompt_injection: null, which is not a safe verdict.',
        input: {
          user_input: z.string().describe('Text to scan'),
          tag: z.string().default('mcp_scan').describe('Identifier for this scan'),
          ...credentials,
        },
        run: (args) => scanForPromptInjection(this.scoring, args),
      }),
      defineTool({
        name: 'check_sensitive_file_access',
        description: 'Check whether an AI agent is accessing a sensitive file. A failed check returns action DENY_SAFE.',
        input: {
          file_path: z.string().describe('Path the agent is accessing'),
          agent_action: z.string().describe('Action being performed, e.g. read, write, execute'),
          tag: z.string().default('file_access_check').describe('Identifier for this check'),
          ...credentials,
        },
        run: (args) => checkSensitiveFileAccess(this.scoring, args),
      }),
    ];
  }
}
