import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { watermarkContent, embedMetadata, contentHash } from '../src/transparency/index.js';
import type { TextWatermarkMetadata } from '../src/transparency/index.js';

const FIXED = new Date('2026-03-01T12:00:00.000Z');
const now = (): Date => FIXED;

function sha16(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex').slice(0, 16);
}

describe('watermarkContent', () => {
  it('embeds a plain-text marker with a content hash', () => {
    const result = watermarkContent(
      { content_type: 'text', content_description: 'summary', text_content: 'Hello world', generator: 'TestModel' },
      { now },
    );
    if ('error' in result || result.content_type !== 'text') throw new Error('expected a text watermark');

    const metadata = {
      ai_generated: true,
      generator: 'TestModel',
      timestamp: '2026-03-01T12:00:00.000Z',
      content_hash: sha16('Hello world'),
      compliance: 'EU AI Act Article 50(2)',
      watermark_version: '1.0',
    };
    expect(result.metadata).toEqual(metadata);
    expect(result.format).toBe('plain');
    expect(result.watermarked_text).toBe(`[AI-WATERMARK:${JSON.stringify(metadata)}]\n\nHello world`);
    expect(result.verification).toBe(`Content hash: ${sha16('Hello world')}`);
    expect(result.original_length).toBe(11);
  });

  it('defaults the generator to "AI"', () => {
    const result = watermarkContent({ content_type: 'text', content_description: 'x', text_content: 't' }, { now });
    if ('error' in result || result.content_type !== 'text') throw new Error('expected a text watermark');
    expect(result.metadata.generator).toBe('AI');
  });

  it('requires text_content for text', () => {
    expect(watermarkContent({ content_type: 'text', content_description: 'x' }, { now })).toEqual({
      error: "text_content is required for content_type='text'",
      usage: 'Provide the actual text to be watermarked',
    });
  });

  it('builds C2PA and IPTC metadata for images', () => {
    const result = watermarkContent(
      { content_type: 'image', content_description: 'sunset', generator: 'ImageGen' },
      { now },
    );
    if ('error' in result || result.content_type === 'text') throw new Error('expected a media watermark');
    expect(result.format).toBe('png');
    expect(result.c2pa_metadata.claim_generator).toBe('EU AI Act Compliance MCP Server');
    expect(result.c2pa_metadata.signature).toBe('ES256');
    expect(result.c2pa_metadata.content_hash).toBe(sha16('sunset'));
    expect(result.iptc_metadata?.Credit).toBe('Generated by ImageGen');
    expect(result.verification_url).toBe('https://verify.contentauthenticity.org/');
    expect(result.implementation_instructions[0]).toBe('1. Use C2PA library to embed metadata in png file');
  });

  it('adds ID3 tags and no signature for audio', () => {
    const result = watermarkContent(
      { content_type: 'audio', content_description: 'jingle', format_type: 'wav' },
      { now },
    );
    if ('error' in result || result.content_type === 'text') throw new Error('expected a media watermark');
    expect(result.audio_metadata?.ID3_tags).toEqual({
      TIT2: 'jingle',
      TPE1: 'AI',
      COMM: 'AI-generated audio - EU AI Act Article 50(2)',
      TDRC: '2026-03-01T12:00:00.000Z',
    });
    expect(result.c2pa_metadata.signature).toBeUndefined();
    expect(result.inaudible).toBe(true);
    expect(result.verification_url).toBeUndefined();
    expect(result.format).toBe('wav');
  });

  it('rejects an unknown content type', () => {
    expect(watermarkContent({ content_type: 'pdf', content_description: 'x' }, { now })).toEqual({
      error: "Invalid content_type 'pdf'",
      valid_types: ['text', 'image', 'video', 'audio'],
    });
  });
});

describe('embedMetadata', () => {
  const metadata: TextWatermarkMetadata = {
    ai_generated: true,
    generator: 'AI',
    timestamp: '2026-03-01T12:00:00.000Z',
    content_hash: contentHash('body'),
    compliance: 'EU AI Act Article 50(2)',
    watermark_version: '1.0',
  };

  it('wraps html metadata in a comment block', () => {
    expect(embedMetadata('<p>body</p>', metadata, 'html'))
      .toBe(`<!-- AI-Generated Content Metadata\n${JSON.stringify(metadata, null, 2)}\n-->\n<p>body</p>`);
  });

  it('uses a single-line comment for markdown', () => {
    expect(embedMetadata('# body', metadata, 'markdown'))
      .toBe(`<!-- AI Watermark: ${JSON.stringify(metadata)} -->\n# body`);
  });

  it('falls back to the plain marker for unknown formats', () => {
    expect(embedMetadata('body', metadata, 'rtf')).toBe(embedMetadata('body', metadata, 'plain'));
  });
});
