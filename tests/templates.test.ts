import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, copyFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TemplateStore, TEMPLATE_FILES, lookup } from '../src/templates/index.js';
import { TemplateLoadError } from '../src/errors.js';
import { defaultResourcesPath } from '../src/config.js';

describe('TemplateStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'eu-ai-act-templates-'));
    for (const file of Object.values(TEMPLATE_FILES)) {
      copyFileSync(join(defaultResourcesPath(), file), join(dir, file));
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled resources', () => {
    const store = TemplateStore.load(dir);
    expect(store.labels.image.en.standard).toBe('AI-generated image');
    expect(store.rawText('article50_rules')).toContain('"article": "Article 50"');
  });

  it('serves raw text byte-for-byte', () => {
    const text = '{"version":"9.9","standards":{},"content_types":{},"compliance_notes":null}';
    writeFileSync(join(dir, TEMPLATE_FILES.watermark_config), text);
    expect(TemplateStore.load(dir).rawText('watermark_config')).toBe(text);
  });

  it('names a missing file', () => {
    rmSync(join(dir, TEMPLATE_FILES.deepfake_labels));
    let caught: unknown;
    try {
      TemplateStore.load(dir);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TemplateLoadError);
    if (caught instanceof TemplateLoadError) expect(caught.file).toBe('deepfake_labels.json');
  });

  it('rejects malformed JSON', () => {
    writeFileSync(join(dir, TEMPLATE_FILES.article50_rules), '{ not json');
    expect(() => TemplateStore.load(dir)).toThrow(TemplateLoadError);
  });

  it('rejects a document with the wrong shape', () => {
    writeFileSync(join(dir, TEMPLATE_FILES.disclosure_templates), JSON.stringify({ ai_interaction: {} }));
    expect(() => TemplateStore.load(dir)).toThrow(/disclosure_templates\.json: emotion_recognition: Required/);
  });
});

describe('lookup', () => {
  it('returns own properties only', () => {
    const record: Record<string, number> = { en: 1 };
    expect(lookup(record, 'en')).toBe(1);
    expect(lookup(record, 'toString')).toBeUndefined();
    expect(lookup(record, '__proto__')).toBeUndefined();
  });
});
