import { describe, it, expect, beforeAll } from 'vitest';
import { getDisclosure, getDeepfakeLabelTemplates, labelDeepfake } from '../src/transparency/index.js';
import { TemplateStore } from '../src/templates/index.js';
import { defaultResourcesPath } from '../src/config.js';

let store: TemplateStore;

beforeAll(() => {
  store = TemplateStore.load(defaultResourcesPath());
});

describe('getDisclosure', () => {
  it('returns the simple English AI-interaction text by default', () => {
    const result = getDisclosure(store, { disclosure_type: 'ai_interaction' });
    if ('error' in result) throw new Error('expected a disclosure');
    expect(result.article).toBe('50(1)');
    expect(result.disclosure).toBe('You are interacting with an AI system.');
    expect(result.language).toBe('en');
    expect(result.style).toBe('simple');
    expect(result.compliance_deadline).toBe('2026-08-02');
    expect(result.gdpr_compliance).toBeUndefined();
  });

  it('adds the consent note for emotion recognition', () => {
    const result = getDisclosure(store, { disclosure_type: 'emotion_recognition', language: 'de' });
    if ('error' in result) throw new Error('expected a disclosure');
    expect(result.article).toBe('50(3)');
    expect(result.disclosure).toBe('Dieses System verwendet KI zur Emotionserkennung.');
    expect(result.gdpr_compliance).toBe('Ensure user consent is obtained');
  });

  it('rejects an unknown disclosure type', () => {
    expect(getDisclosure(store, { disclosure_type: 'chatbot' })).toEqual({
      error: "Invalid disclosure_type 'chatbot'",
      valid_types: ['ai_interaction', 'emotion_recognition'],
    });
  });

  it('lists available languages and styles when a combination is missing', () => {
    expect(getDisclosure(store, { disclosure_type: 'ai_interaction', language: 'fr', style: 'poster' })).toEqual({
      error: "Disclosure not found for type 'ai_interaction', language 'fr', style 'poster'",
      available_languages: ['en', 'es', 'fr', 'de', 'it'],
      available_styles: ['simple', 'detailed', 'voice'],
    });
  });

  it('does not resolve inherited object keys as languages', () => {
    const result = getDisclosure(store, { disclosure_type: 'ai_interaction', language: 'constructor' });
    expect(result).toEqual({
      error: "Disclosure not found for type 'ai_interaction', language 'constructor', style 'simple'",
      available_languages: ['en', 'es', 'fr', 'de', 'it'],
      available_styles: [],
    });
  });
});

describe('getDeepfakeLabelTemplates', () => {
  it('returns every content type for a supported language', () => {
    const result = getDeepfakeLabelTemplates(store, 'es');
    expect(result.article).toBe('50(2) and 50(4)');
    expect(result.content_types.image).toEqual({
      standard: 'Imagen generada por IA',
      artistic: 'Contiene elementos generados por IA',
    });
    expect(result.available_languages).toEqual(['en', 'es', 'fr', 'de']);
  });

  it('reports a missing language per content type', () => {
    const result = getDeepfakeLabelTemplates(store, 'it');
    expect(result.content_types.audio).toEqual({
      error: "Language 'it' not available for audio",
      available_languages: ['en', 'es', 'fr', 'de'],
    });
  });
});

describe('labelDeepfake', () => {
  it('prepends the editor disclosure to text', () => {
    const result = labelDeepfake(store, {
      content_type: 'text',
      content_description: 'market report',
      text_content: 'Shares rose.',
      has_human_editor: true,
      editor_name: 'Jane Doe',
    });
    if ('error' in result || result.content_type !== 'text') throw new Error('expected a text label');
    expect(result.disclosure).toBe('This text was generated with the assistance of AI and reviewed by Jane Doe.');
    expect(result.labeled_text).toBe(
      '[This text was generated with the assistance of AI and reviewed by Jane Doe.]\n\nShares rose.',
    );
    expect(result.original_length).toBe(12);
    expect(result.labeled_length).toBe(result.labeled_text.length);
    expect(result.exemption_applies).toBe(true);
  });

  it('falls back to "editorial team" when the editor name is empty', () => {
    const result = labelDeepfake(store, {
      content_type: 'text',
      content_description: 'x',
      text_content: 'Body',
      has_human_editor: true,
    });
    if ('error' in result || result.content_type !== 'text') throw new Error('expected a text label');
    expect(result.disclosure).toBe('This text was generated with the assistance of AI and reviewed by editorial team.');
  });

  it('uses the no-editor disclosure without human review', () => {
    const result = labelDeepfake(store, { content_type: 'text', content_description: 'x', text_content: 'Body' });
    if ('error' in result || result.content_type !== 'text') throw new Error('expected a text label');
    expect(result.labeled_text).toBe('[This text was generated by artificial intelligence.]\n\nBody');
    expect(result.exemption_applies).toBe(false);
  });

  it('counts code points, not UTF-16 units', () => {
    const result = labelDeepfake(store, { content_type: 'text', content_description: 'x', text_content: 'ok 👍' });
    if ('error' in result || result.content_type !== 'text') throw new Error('expected a text label');
    expect(result.original_length).toBe(4);
  });

  it('requires text_content for text', () => {
    expect(labelDeepfake(store, { content_type: 'text', content_description: 'x' })).toEqual({
      error: "text_content is required for content_type='text'",
      usage: 'Provide the actual text to be labeled',
    });
  });

  it('uses the artistic label for satirical images', () => {
    const result = labelDeepfake(store, { content_type: 'image', content_description: 'parody poster', is_satirical: true });
    if ('error' in result || result.content_type !== 'image') throw new Error('expected an image label');
    expect(result.label_text).toBe('Contains AI-generated elements');
    expect(result.description).toBe('parody poster');
    expect(result.exemption_applies).toBe(true);
    expect(result.timing_guidance).toBeUndefined();
  });

  it('adds timing guidance for video', () => {
    const result = labelDeepfake(store, { content_type: 'video', content_description: 'clip' });
    if ('error' in result || result.content_type !== 'video') throw new Error('expected a video label');
    expect(result.label_text).toBe('AI-generated video');
    expect(result.timing_guidance).toBe('If using title card, display for minimum 3 seconds at start');
  });

  it('returns written and spoken labels for audio', () => {
    const result = labelDeepfake(store, { content_type: 'audio', content_description: 'podcast', language: 'fr' });
    if ('error' in result || result.content_type !== 'audio') throw new Error('expected an audio label');
    expect(result.written_label).toBe('Audio généré par IA');
    expect(result.spoken_label).toBe("L'audio suivant a été généré par une intelligence artificielle.");
    expect(result.exemption_applies).toBe(false);
  });

  it('reports an unavailable label language', () => {
    expect(labelDeepfake(store, { content_type: 'image', content_description: 'x', language: 'pl' })).toEqual({
      error: "Labels not found for language 'pl'",
      available_languages: ['en', 'es', 'fr', 'de'],
    });
  });

  it('rejects an unknown content type', () => {
    expect(labelDeepfake(store, { content_type: 'hologram', content_description: 'x' })).toEqual({
      error: "Invalid content_type 'hologram'",
      valid_types: ['text', 'image', 'video', 'audio'],
    });
  });
});
