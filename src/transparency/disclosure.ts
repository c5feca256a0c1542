/**
 * Article 50(1) and 50(3) disclosure texts.
 */

import { lookup, type TemplateStore } from '../templates/index.js';
import { TRANSPARENCY_DEADLINE } from '../classification/index.js';
import type { ContentType, DisclosureType, UserErrorResult } from '../types/index.js';

export const DISCLOSURE_TYPES: readonly DisclosureType[] = ['ai_interaction', 'emotion_recognition'];
export const LABEL_CONTENT_TYPES: readonly ContentType[] = ['text', 'image', 'video', 'audio'];

const DISCLOSURE_META: Record<DisclosureType, { article: string; obligation: string; usage: string }> = {
  ai_interaction: {
    article: '50(1)',
    obligation: 'AI Interaction Transparency',
    usage: 'Display this text to users before or during AI interaction',
  },
  emotion_recognition: {
    article: '50(3)',
    obligation: 'Emotion Recognition Transparency',
    usage: 'Display this text to users before activating emotion recognition',
  },
};

export interface DisclosureRequest {
  disclosure_type: string;
  language?: string;
  style?: string;
}

export interface Disclosure {
  article: string;
  obligation: string;
  disclosure_type: DisclosureType;
  language: string;
  style: string;
  disclosure: string;
  usage: string;
  gdpr_compliance?: string;
  compliance_deadline: string;
}

export function isDisclosureType(value: string): value is DisclosureType {
  return DISCLOSURE_TYPES.some((t) => t === value);
}

export function getDisclosure(store: TemplateStore, request: DisclosureRequest): Disclosure | UserErrorResult {
  const { disclosure_type: type, language = 'en', style = 'simple' } = request;
  if (!isDisclosureType(type)) {
    return { error: `Invalid disclosure_type '${type}'`, valid_types: [...DISCLOSURE_TYPES] };
  }

  const byLanguage = store.disclosures[type];
  const styles = lookup(byLanguage, language);
  const text = styles ? lookup(styles, style) : undefined;
  if (text === undefined) {
    return {
      error: `Disclosure not found for type '${type}', language '${language}', style '${style}'`,
      available_languages: Object.keys(byLanguage),
      available_styles: styles ? Object.keys(styles) : [],
    };
  }

  const meta = DISCLOSURE_META[type];
  const result: Disclosure = {
    article: meta.article,
    obligation: meta.obligation,
    disclosure_type: type,
    language,
    style,
    disclosure: text,
    usage: meta.usage,
    compliance_deadline: TRANSPARENCY_DEADLINE,
  };
  if (type === 'emotion_recognition') result.gdpr_compliance = 'Ensure user consent is obtained';
  return result;
}

export interface LabelTemplates {
  language: string;
  content_types: Partial<Record<ContentType, Record<string, string> | UserErrorResult>>;
  article: string;
  purpose: string;
  available_languages: string[];
}

/** Every content type's label set in one language; a missing language is reported per type. */
export function getDeepfakeLabelTemplates(store: TemplateStore, language = 'en'): LabelTemplates {
  const contentTypes: LabelTemplates['content_types'] = {};
  const languages = new Set<string>();

  for (const contentType of LABEL_CONTENT_TYPES) {
    const byLanguage = store.labels[contentType];
    for (const lang of Object.keys(byLanguage)) languages.add(lang);
    const labels = lookup(byLanguage, language);
    contentTypes[contentType] = labels
      ? { ...labels }
      : { error: `Language '${language}' not available for ${contentType}`, available_languages: Object.keys(byLanguage) };
  }

  return {
    language,
    content_types: contentTypes,
    article: '50(2) and 50(4)',
    purpose: 'Labels for AI-generated and manipulated content',
    available_languages: [...languages],
  };
}
