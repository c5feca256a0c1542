/**
 * Article 50(2) machine-readable marking.
 *
 * Text is returned with the metadata embedded. Media types get C2PA metadata
 * (plus IPTC for images, ID3 for audio) to embed with external tooling.
 */

import { createHash } from 'node:crypto';
import { TRANSPARENCY_DEADLINE } from '../classification/index.js';
import { LABEL_CONTENT_TYPES } from './disclosure.js';
import { isContentType, charLength } from './deepfake.js';
import type { ContentType, UserErrorResult } from '../types/index.js';

export const DEFAULT_FORMATS: Record<ContentType, string> = {
  text: 'plain',
  image: 'png',
  video: 'mp4',
  audio: 'mp3',
};

const CLAIM_GENERATOR = 'EU AI Act Compliance MCP Server';
const VERIFICATION_URL = 'https://verify.contentauthenticity.org/';

export interface WatermarkRequest {
  content_type: string;
  content_description: string;
  generator?: string;
  format_type?: string;
  text_content?: string;
}

export interface WatermarkOptions {
  now?: () => Date;
}

export interface TextWatermarkMetadata {
  ai_generated: true;
  generator: string;
  timestamp: string;
  content_hash: string;
  compliance: string;
  watermark_version: string;
}

export interface TextWatermark {
  article: '50(2)';
  obligation: string;
  content_type: 'text';
  watermarked_text: string;
  metadata: TextWatermarkMetadata;
  original_length: number;
  watermarked_length: number;
  format: string;
  machine_readable: true;
  detectable: true;
  compliance_deadline: string;
  usage: string;
  verification: string;
}

export interface C2paMetadata {
  claim_generator: string;
  claim_timestamp: string;
  assertions: Record<string, unknown>;
  signature?: string;
  hash_algorithm?: string;
  content_hash: string;
}

export interface MediaWatermark {
  article: '50(2)';
  obligation: string;
  applies_to: 'provider';
  content_type: 'image' | 'video' | 'audio';
  description: string;
  generator: string;
  format: string;
  c2pa_metadata: C2paMetadata;
  iptc_metadata?: Record<string, string>;
  audio_metadata?: { ID3_tags: Record<string, string> };
  watermark_standard?: string;
  watermark_method?: string;
  machine_readable: true;
  detectable: true;
  inaudible?: true;
  compliance_deadline: string;
  implementation_instructions: string[];
  verification_url?: string;
  usage: string;
}

export type Watermark = TextWatermark | MediaWatermark;

export function contentHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex').slice(0, 16);
}

export function watermarkContent(request: WatermarkRequest, options: WatermarkOptions = {}): Watermark | UserErrorResult {
  const type = request.content_type;
  if (!isContentType(type)) {
    return { error: `Invalid content_type '${type}'`, valid_types: [...LABEL_CONTENT_TYPES] };
  }

  const generator = request.generator ?? 'AI';
  const format = request.format_type ?? DEFAULT_FORMATS[type];
  const timestamp = (options.now ?? (() => new Date()))().toISOString();

  if (type === 'text') return watermarkText(request.text_content, generator, format, timestamp);
  return watermarkMedia(type, request.content_description, generator, format, timestamp);
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

function watermarkText(text: string | undefined, generator: string, format: string, timestamp: string): TextWatermark | UserErrorResult {
  if (text === undefined) {
    return { error: "text_content is required for content_type='text'", usage: 'Provide the actual text to be watermarked' };
  }

  const hash = contentHash(text);
  const metadata: TextWatermarkMetadata = {
    ai_generated: true,
    generator,
    timestamp,
    content_hash: hash,
    compliance: 'EU AI Act Article 50(2)',
    watermark_version: '1.0',
  };
  const watermarked = embedMetadata(text, metadata, format);

  return {
    article: '50(2)',
    obligation: 'Content Watermarking (Text)',
    content_type: 'text',
    watermarked_text: watermarked,
    metadata,
    original_length: charLength(text),
    watermarked_length: charLength(watermarked),
    format,
    machine_readable: true,
    detectable: true,
    compliance_deadline: TRANSPARENCY_DEADLINE,
    usage: 'Use watermarked_text instead of original. Metadata is machine-readable.',
    verification: `Content hash: ${hash}`,
  };
}

/** Unknown formats fall back to the plain-text marker. */
export function embedMetadata(text: string, metadata: TextWatermarkMetadata, format: string): string {
  switch (format) {
    case 'html':
      return `<!-- AI-Generated Content Metadata\n${JSON.stringify(metadata, null, 2)}\n-->\n${text}`;
    case 'markdown':
      return `<!-- AI Watermark: ${JSON.stringify(metadata)} -->\n${text}`;
    default:
      return `[AI-WATERMARK:${JSON.stringify(metadata)}]\n\n${text}`;
  }
}

// ---------------------------------------------------------------------------
// Media
// ---------------------------------------------------------------------------

const SCHEMA_ORG_TYPE: Record<'image' | 'video' | 'audio', string> = {
  image: 'stds.schema-org.CreativeWork',
  video: 'stds.schema-org.VideoObject',
  audio: 'stds.schema-org.AudioObject',
};

function watermarkMedia(
  type: 'image' | 'video' | 'audio',
  description: string,
  generator: string,
  format: string,
  timestamp: string,
): MediaWatermark {
  const c2pa: C2paMetadata = {
    claim_generator: CLAIM_GENERATOR,
    claim_timestamp: timestamp,
    assertions: {
      'c2pa.actions': 'ai_generated',
      [SCHEMA_ORG_TYPE[type]]: {
        creator: generator,
        dateCreated: timestamp,
        description,
        ai_generated: true,
      },
    },
    // audio claims carry no signature fields
    ...(type === 'audio' ? {} : { signature: 'ES256', hash_algorithm: 'SHA-256' }),
    content_hash: contentHash(description),
  };

  const base = {
    article: '50(2)' as const,
    applies_to: 'provider' as const,
    content_type: type,
    description,
    generator,
    format,
    c2pa_metadata: c2pa,
    machine_readable: true as const,
    detectable: true as const,
    compliance_deadline: TRANSPARENCY_DEADLINE,
  };

  switch (type) {
    case 'image':
      return {
        ...base,
        obligation: 'Content Watermarking (Image)',
        iptc_metadata: {
          'Digital Source Type': 'trainedAlgorithmicMedia',
          Credit: `Generated by ${generator}`,
          Creator: generator,
          'Date Created': timestamp,
          'Copyright Notice': 'AI-generated content subject to EU AI Act Article 50(2)',
        },
        watermark_standard: 'C2PA 2.1',
        implementation_instructions: [
          `1. Use C2PA library to embed metadata in ${format} file`,
          '2. Add IPTC metadata as fallback',
          '3. Ensure watermark survives compression and resizing',
          '4. Verify watermark using C2PA verification tools',
          '5. Store watermarked version separately from original',
        ],
        verification_url: VERIFICATION_URL,
        usage: 'Use provided metadata to watermark the image file using C2PA-compliant tools',
      };
    case 'video':
      return {
        ...base,
        obligation: 'Content Watermarking (Video)',
        watermark_standard: 'C2PA 2.1',
        watermark_method: 'Frame-level embedding',
        implementation_instructions: [
          `1. Use C2PA video library to embed metadata in ${format} file`,
          '2. Apply watermark at frame level for persistence',
          '3. Embed metadata in video container and frames',
          '4. Ensure watermark survives re-encoding',
          '5. Test with multiple video players',
        ],
        verification_url: VERIFICATION_URL,
        usage: 'Use provided metadata to watermark the video file using C2PA-compliant tools',
      };
    case 'audio':
      return {
        ...base,
        obligation: 'Content Watermarking (Audio)',
        audio_metadata: {
          ID3_tags: {
            TIT2: description,
            TPE1: generator,
            COMM: 'AI-generated audio - EU AI Act Article 50(2)',
            TDRC: timestamp,
          },
        },
        watermark_method: 'Spectral embedding + ID3 tags',
        inaudible: true,
        implementation_instructions: [
          `1. Embed C2PA metadata in ${format} file`,
          '2. Add ID3 tags for MP3 or equivalent for other formats',
          '3. Apply inaudible spectral watermark (18-20kHz range)',
          '4. Ensure watermark survives format conversion',
          '5. Test detectability after compression',
        ],
        usage: 'Use provided metadata to watermark the audio file',
      };
  }
}
