/**
 * Article 50(4) labels for AI-generated or manipulated content.
 *
 * Text gets an inline disclosure prepended. Image and video get a visible
 * label plus placement guidance. Audio gets a written and a spoken label.
 */

import { lookup, type TemplateStore } from '../templates/index.js';
import { TRANSPARENCY_DEADLINE } from '../classification/index.js';
import { LABEL_CONTENT_TYPES } from './disclosure.js';
import type { ContentType, UserErrorResult } from '../types/index.js';

export interface LabelRequest {
  content_type: string;
  content_description: string;
  is_artistic_work?: boolean;
  is_satirical?: boolean;
  language?: string;
  text_content?: string;
  has_human_editor?: boolean;
  editor_name?: string;
}

export interface TextLabel {
  article: '50(4)';
  obligation: string;
  content_type: 'text';
  language: string;
  labeled_text: string;
  disclosure: string;
  original_length: number;
  labeled_length: number;
  has_human_editor: boolean;
  exemption_applies: boolean;
  exemption_reason: string;
  compliance_deadline: string;
  usage: string;
}

export interface VisualLabel {
  article: '50(4)';
  obligation: string;
  applies_to: 'deployer';
  content_type: 'image' | 'video';
  description: string;
  label_text: string;
  language: string;
  placement_options: string[];
  recommended_placement: string;
  visibility_requirement: string;
  label_persistence: string;
  timing_guidance?: string;
  is_artistic_work: boolean;
  is_satirical: boolean;
  exemption_applies: boolean;
  exemption_reason: string;
  compliance_deadline: string;
  implementation_notes: string[];
  usage: string;
}

export interface AudioLabel {
  article: '50(4)';
  obligation: string;
  applies_to: 'deployer';
  content_type: 'audio';
  description: string;
  written_label: string;
  spoken_label: string;
  language: string;
  disclosure_methods: string[];
  recommended_method: string;
  spoken_disclosure_timing: string;
  is_artistic_work: boolean;
  exemption_applies: boolean;
  exemption_reason: string;
  compliance_deadline: string;
  implementation_notes: string[];
  usage: string;
}

export type ContentLabel = TextLabel | VisualLabel | AudioLabel;

export function isContentType(value: string): value is ContentType {
  return LABEL_CONTENT_TYPES.some((t) => t === value);
}

export function labelDeepfake(store: TemplateStore, request: LabelRequest): ContentLabel | UserErrorResult {
  const type = request.content_type;
  if (!isContentType(type)) {
    return { error: `Invalid content_type '${type}'`, valid_types: [...LABEL_CONTENT_TYPES] };
  }

  switch (type) {
    case 'text': return labelText(store, request);
    case 'image': return labelVisual(store, 'image', request);
    case 'video': return labelVisual(store, 'video', request);
    case 'audio': return labelAudio(store, request);
  }
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

function labelText(store: TemplateStore, request: LabelRequest): TextLabel | UserErrorResult {
  const { text_content: text, language = 'en', has_human_editor: edited = false, editor_name: editor = '' } = request;
  if (text === undefined) {
    return { error: "text_content is required for content_type='text'", usage: 'Provide the actual text to be labeled' };
  }

  const labels = lookup(store.labels.text, language);
  const template = labels ? lookup(labels, edited ? 'news' : 'news_no_editor') : undefined;
  if (!labels || template === undefined) return missingLanguage(store, 'text', language);

  const disclosure = edited ? template.replace('{editor}', editor || 'editorial team') : template;
  const labeled = `[${disclosure}]\n\n${text}`;

  return {
    article: '50(4)',
    obligation: 'AI-Generated Content Labeling (Text/News)',
    content_type: 'text',
    language,
    labeled_text: labeled,
    disclosure,
    original_length: charLength(text),
    labeled_length: charLength(labeled),
    has_human_editor: edited,
    exemption_applies: edited,
    exemption_reason: edited ? 'Human editorial oversight present' : 'No human editorial oversight',
    compliance_deadline: TRANSPARENCY_DEADLINE,
    usage: 'Publish the labeled_text instead of the original text',
  };
}

// ---------------------------------------------------------------------------
// Image / video
// ---------------------------------------------------------------------------

interface VisualGuidance {
  obligation: string;
  placement_options: string[];
  recommended_placement: string;
  visibility_requirement: string;
  label_persistence: string;
  timing_guidance?: string;
  implementation_notes: string[];
  usage: string;
}

const VISUAL_GUIDANCE: Record<'image' | 'video', VisualGuidance> = {
  image: {
    obligation: 'Deepfake Labeling (Image)',
    placement_options: [
      'Top-left corner overlay',
      'Bottom banner overlay',
      'Visible watermark across image',
      'Caption below image',
    ],
    recommended_placement: 'Top-left corner overlay with semi-transparent background',
    visibility_requirement: 'Prominent and clearly distinguishable',
    label_persistence: 'Must not be easily removable',
    implementation_notes: [
      'Label must be visible without zooming or special tools',
      'Text size must be legible (minimum 12pt or 5% of image height)',
      'Background contrast must ensure readability',
      'Label should persist in downloaded/shared versions',
    ],
    usage: 'Add this label text to the image using one of the placement options',
  },
  video: {
    obligation: 'Deepfake Labeling (Video)',
    placement_options: [
      'Persistent overlay in corner throughout video',
      'Opening title card (3-5 seconds)',
      'Closing credit with disclosure',
      'Intermittent overlay every 30 seconds',
    ],
    recommended_placement: 'Persistent semi-transparent overlay in top-left corner',
    visibility_requirement: 'Clearly visible and distinguishable throughout playback',
    label_persistence: 'Must persist in all playback formats and cannot be easily removed',
    timing_guidance: 'If using title card, display for minimum 3 seconds at start',
    implementation_notes: [
      'Label must be visible at standard playback resolution',
      'Text size must be legible (minimum 5% of frame height)',
      'Use high contrast background for readability',
      'Label must persist through video editing and re-encoding',
      'Consider accessibility: include spoken disclosure for audio description',
    ],
    usage: 'Add this label to the video using one of the placement options',
  },
};

function labelVisual(store: TemplateStore, type: 'image' | 'video', request: LabelRequest): VisualLabel | UserErrorResult {
  const { language = 'en', is_artistic_work: artistic = false, is_satirical: satirical = false } = request;
  const exempt = artistic || satirical;

  const labels = lookup(store.labels[type], language);
  const labelText = labels ? lookup(labels, exempt ? 'artistic' : 'standard') : undefined;
  if (labelText === undefined) return missingLanguage(store, type, language);

  const guidance = VISUAL_GUIDANCE[type];
  return {
    article: '50(4)',
    obligation: guidance.obligation,
    applies_to: 'deployer',
    content_type: type,
    description: request.content_description,
    label_text: labelText,
    language,
    placement_options: [...guidance.placement_options],
    recommended_placement: guidance.recommended_placement,
    visibility_requirement: guidance.visibility_requirement,
    label_persistence: guidance.label_persistence,
    ...(guidance.timing_guidance ? { timing_guidance: guidance.timing_guidance } : {}),
    is_artistic_work: artistic,
    is_satirical: satirical,
    exemption_applies: exempt,
    exemption_reason: exempt ? 'Artistic work or satire - modified disclosure' : 'Standard disclosure required',
    compliance_deadline: TRANSPARENCY_DEADLINE,
    implementation_notes: [...guidance.implementation_notes],
    usage: guidance.usage,
  };
}

// ---------------------------------------------------------------------------
// Audio
// ---------------------------------------------------------------------------

function labelAudio(store: TemplateStore, request: LabelRequest): AudioLabel | UserErrorResult {
  const { language = 'en', is_artistic_work: artistic = false } = request;

  const labels = lookup(store.labels.audio, language);
  const written = labels ? lookup(labels, 'standard') : undefined;
  const spoken = labels ? lookup(labels, 'spoken') : undefined;
  if (written === undefined || spoken === undefined) return missingLanguage(store, 'audio', language);

  return {
    article: '50(4)',
    obligation: 'Deepfake Labeling (Audio)',
    applies_to: 'deployer',
    content_type: 'audio',
    description: request.content_description,
    written_label: written,
    spoken_label: spoken,
    language,
    disclosure_methods: [
      'Spoken announcement at beginning of audio',
      'Written disclosure in audio player interface',
      'Metadata embedded in audio file',
      'Text description accompanying audio',
    ],
    recommended_method: 'Spoken announcement at beginning + written metadata',
    spoken_disclosure_timing: 'Beginning of audio (first 3 seconds)',
    is_artistic_work: artistic,
    exemption_applies: artistic,
    exemption_reason: artistic ? 'Artistic work - modified disclosure may apply' : 'Standard disclosure required',
    compliance_deadline: TRANSPARENCY_DEADLINE,
    implementation_notes: [
      'Spoken disclosure should be clear and at normal speech volume',
      'Written disclosure must accompany audio in player/platform',
      'Embed disclosure in audio file metadata (ID3 tags, etc.)',
      'Consider accessibility: provide written version for deaf users',
      'Disclosure should be in same language as primary audio content',
    ],
    usage: 'Add spoken disclosure at audio start and include written label in metadata/description',
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function missingLanguage(store: TemplateStore, type: ContentType, language: string): UserErrorResult {
  return {
    error: `Labels not found for language '${language}'`,
    available_languages: Object.keys(store.labels[type]),
  };
}

/** Length in code points, so non-BMP characters count once. */
export function charLength(text: string): number {
  return [...text].length;
}
