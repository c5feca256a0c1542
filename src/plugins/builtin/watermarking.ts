/**
 * Watermarking plugin (Article 50(2)).
 */

import { z } from 'zod';
import { BasePlugin } from '../base.js';
import { defineTool, type ToolDefinition, type ResourceDefinition } from '../types.js';
import { watermarkContent, type WatermarkOptions } from '../../transparency/index.js';
import type { TemplateStore } from '../../templates/index.js';

export class WatermarkingPlugin extends BasePlugin {
  readonly name = 'WatermarkingPlugin';
  readonly description = 'Provides EU AI Act Article 50(2) watermarking metadata for AI-generated content';

  constructor(
    private readonly templates: TemplateStore,
    private readonly options: WatermarkOptions = {},
  ) {
    super();
  }

  getTools(): ToolDefinition[] {
    return [
      defineTool({
        name: 'watermark_content',
        description: 'Produce watermark metadata for AI-generated content. Text is returned with the metadata embedded.',
        input: {
          content_type: z.string().describe('"text", "image", "video" or "audio"'),
          content_description: z.string().describe('Brief description of the content'),
          generator: z.string().default('AI').describe('Name of the generating AI system'),
          format_type: z.string().optional().describe('text: plain|markdown|html; image: png|jpg|webp; video: mp4|webm|mov; audio: mp3|wav|opus'),
          text_content: z.string().optional().describe('The text to watermark (content_type="text" only)'),
        },
        run: (args) => watermarkContent(args, this.options),
      }),
    ];
  }

  getResources(): ResourceDefinition[] {
    return [{
      uri: 'watermark-config://technical-standards',
      name: 'watermark-config',
      description: 'C2PA and IPTC watermarking standards and embedding guidance',
      mimeType: 'application/json',
      read: () => this.templates.rawText('watermark_config'),
    }];
  }
}
