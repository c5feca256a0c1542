import { z } from 'zod';
import { BasePlugin } from '../base.js';
import { defineTool, type ToolDefinition, type ResourceDefinition } from '../types.js';
import { labelDeepfake } from '../../transparency/index.js';
import type { TemplateStore } from '../../templates/index.js';

/** Article 50(4) deepfake labelling. */
export class DeepfakePlugin extends BasePlugin {
  readonly name = 'DeepfakePlugin';
  readonly description = 'Provides EU AI Act Article 50(4) labels for AI-generated and manipulated content';

  constructor(private readonly templates: TemplateStore) {
    super();
  }

  getTools(): ToolDefinition[] {
    return [
      defineTool({
        name: 'label_deepfake',
        description: 'Generate the Article 50(4) label for AI-generated or manipulated text, image, video or audio.',
        input: {
          content_type: z.string().describe('"text", "image", "video" or "audio"'),
          content_description: z.string().describe('Brief description of the content'),
          is_artistic_work: z.boolean().default(false).describe('Artistic or creative work'),
          is_satirical: z.boolean().default(false).describe('Parody or satire'),
          language: z.string().default('en').describe('Language code: en, es, fr, de'),
          text_content: z.string().optional().describe('The text to label (content_type="text" only)'),
          has_human_editor: z.boolean().default(false).describe('A human editor reviewed the text'),
          editor_name: z.string().default('').describe('Name of the human editor'),
        },
        run: (args) => labelDeepfake(this.templates, args),
      }),
    ];
  }

  getResources(): ResourceDefinition[] {
    return [{
      uri: 'deepfake-labels://content-labeling',
      name: 'deepfake-labels',
      description: 'Labels for AI-generated content by content type and language',
      mimeType: 'application/json',
      read: () => this.templates.rawText('deepfake_labels'),
    }];
  }
}
