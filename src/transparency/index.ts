/**
 * Article 50 disclosures, labels and watermarks.
 */
export {
  getDisclosure, getDeepfakeLabelTemplates, isDisclosureType,
  DISCLOSURE_TYPES, LABEL_CONTENT_TYPES,
} from './disclosure.js';
export type { DisclosureRequest, Disclosure, LabelTemplates } from './disclosure.js';
export { labelDeepfake, isContentType, charLength } from './deepfake.js';
export type { LabelRequest, ContentLabel, TextLabel, VisualLabel, AudioLabel } from './deepfake.js';
export { watermarkContent, embedMetadata, contentHash, DEFAULT_FORMATS } from './watermark.js';
export type {
  WatermarkRequest, WatermarkOptions, Watermark, TextWatermark, MediaWatermark,
  TextWatermarkMetadata, C2paMetadata,
} from './watermark.js';
