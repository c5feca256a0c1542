export { TemplateStore, TEMPLATE_FILES, lookup } from './store.js';
export type { TemplateFile, LocalizedText, DisclosureTemplates, DeepfakeLabels } from './store.js';
