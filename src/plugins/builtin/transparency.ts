/**
 * Article 50(1) and 50(3) disclosures.
 */

import { z } from 'zod';
import { BasePlugin } from '../base.js';
import { defineTool, type ToolDefinition, type ResourceDefinition } from '../types.js';
import { getDisclosure, getDeepfakeLabelTemplates } from '../../transparency/index.js';
import type { TemplateStore } from '../../templates/index.js';

export class TransparencyPlugin extends BasePlugin {
  readonly name = 'TransparencyPlugin';
  readonly description = 'Provides EU AI Act Article 50 transparency disclosures for AI systems';

  constructor(private readonly templates: TemplateStore) {
    super();
  }

  getTools(): ToolDefinition[] {
    return [
      defineTool({
        name: 'get_disclosure',
        description: 'Get disclosure text for AI interaction (Article 50(1)) or emotion recognition (Article 50(3)).',
        input: {
          disclosure_type: z.string().describe('"ai_interaction" or "emotion_recognition"'),
          language: z.string().default('en').describe('Language code: en, es, fr, de, it'),
          style: z.string().default('simple').describe('ai_interaction: simple|detailed|voice; emotion_recognition: simple|detailed|privacy_notice'),
        },
        run: (args) => getDisclosure(this.templates, args),
      }),
      defineTool({
        name: 'get_deepfake_label_templates',
        description: 'List the AI-generated content labels for every content type in one language.',
        input: {
          language: z.string().default('en').describe('Language code: en, es, fr, de'),
        },
        run: (args) => getDeepfakeLabelTemplates(this.templates, args.language),
      }),
    ];
  }

  getResources(): ResourceDefinition[] {
    return [{
      uri: 'disclosure-templates://ai-interaction-and-emotion',
      name: 'disclosure-templates',
      description: 'Pre-written disclosure templates for AI interaction and emotion recognition',
      mimeType: 'application/json',
      read: () => this.templates.rawText('disclosure_templates'),
    }];
  }
}
