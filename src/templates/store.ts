/**
 * Read-only JSON documents under resources/.
 *
 * Files are read and validated once at startup. Raw text is kept so resources
 * can be served byte-for-byte.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { TemplateLoadError } from '../errors.js';

export const TEMPLATE_FILES = {
  article50_rules: 'article50_rules.json',
  disclosure_templates: 'disclosure_templates.json',
  deepfake_labels: 'deepfake_labels.json',
  watermark_config: 'watermark_config.json',
} as const;

export type TemplateFile = keyof typeof TEMPLATE_FILES;

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/** language → key → text */
const LocalizedTextSchema = z.record(z.string(), z.record(z.string(), z.string()));

const DisclosureTemplatesSchema = z.object({
  ai_interaction: LocalizedTextSchema,
  emotion_recognition: LocalizedTextSchema,
});

const DeepfakeLabelsSchema = z.object({
  text: LocalizedTextSchema,
  image: LocalizedTextSchema,
  video: LocalizedTextSchema,
  audio: LocalizedTextSchema,
});

const Article50RulesSchema = z.object({
  article: z.string(),
  title: z.string(),
  obligations: z.array(z.object({
    paragraph: z.string(),
    obligation_type: z.string(),
    applies_to: z.string(),
    deadline: z.string(),
  })).min(1),
  penalties: z.object({
    non_compliance: z.string(),
    enforcement_authority: z.string(),
  }),
  key_definitions: z.record(z.string(), z.string()),
});

const WatermarkConfigSchema = z.object({
  version: z.string(),
  standards: z.record(z.string(), z.unknown()),
  content_types: z.record(z.string(), z.unknown()),
  compliance_notes: z.unknown(),
});

export type LocalizedText = z.infer<typeof LocalizedTextSchema>;
export type DisclosureTemplates = z.infer<typeof DisclosureTemplatesSchema>;
export type DeepfakeLabels = z.infer<typeof DeepfakeLabelsSchema>;

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class TemplateStore {
  private constructor(
    private readonly raw: Readonly<Record<TemplateFile, string>>,
    readonly disclosures: DisclosureTemplates,
    readonly labels: DeepfakeLabels,
  ) {}

  /** Throws TemplateLoadError naming the first unreadable or malformed file. */
  static load(dir: string): TemplateStore {
    const raw = {
      article50_rules: readTemplate(dir, TEMPLATE_FILES.article50_rules),
      disclosure_templates: readTemplate(dir, TEMPLATE_FILES.disclosure_templates),
      deepfake_labels: readTemplate(dir, TEMPLATE_FILES.deepfake_labels),
      watermark_config: readTemplate(dir, TEMPLATE_FILES.watermark_config),
    };

    validate(TEMPLATE_FILES.article50_rules, raw.article50_rules, Article50RulesSchema);
    validate(TEMPLATE_FILES.watermark_config, raw.watermark_config, WatermarkConfigSchema);
    const disclosures = validate(TEMPLATE_FILES.disclosure_templates, raw.disclosure_templates, DisclosureTemplatesSchema);
    const labels = validate(TEMPLATE_FILES.deepfake_labels, raw.deepfake_labels, DeepfakeLabelsSchema);

    return new TemplateStore(raw, disclosures, labels);
  }

  rawText(file: TemplateFile): string {
    return this.raw[file];
  }
}

/** Own-property lookup; user-supplied keys never reach Object.prototype. */
export function lookup<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

function readTemplate(dir: string, file: string): string {
  try {
    return readFileSync(join(dir, file), 'utf-8');
  } catch (err) {
    throw new TemplateLoadError(file, err);
  }
}

function validate<T>(file: string, text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new TemplateLoadError(file, err);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new TemplateLoadError(file, new Error(`${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}
