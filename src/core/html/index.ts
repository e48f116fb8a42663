/**
 * HTML Module
 * Vanity page rendering
 */

export {
  renderVanityPage,
  goImportContent,
  goSourceContent,
  goSourceDirTemplate,
  goSourceFileTemplate,
} from './renderer.js';
export { renderTemplate, escapeHtml } from './template.js';

export type { VanityRecord } from './renderer.js';
export type { TemplateFields } from './template.js';
