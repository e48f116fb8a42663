/**
 * Vanity Page Renderer
 * Derives the meta tag contents for a GitHub-hosted repository
 */

import { DEFAULT_BRANCH } from '../../utils/constants.js';
import { renderTemplate } from './template.js';

/**
 * View model handed to the template
 */
export interface VanityRecord {
  /** Import path of the package the page is for */
  importPath: string;
  /** Import path of the repository root, before rewriting */
  rootImportPath: string;
  /** Repository location on the hosting service, e.g. "github.com/user/repo" */
  repositoryHost: string;
}

/**
 * go-import content
 *
 * See: https://golang.org/cmd/go/#hdr-Remote_import_paths
 */
export function goImportContent(record: VanityRecord): string {
  return `${record.rootImportPath} git https://${record.repositoryHost}.git`;
}

export function goSourceDirTemplate(repositoryHost: string): string {
  return `https://${repositoryHost}/blob/${DEFAULT_BRANCH}{/dir}`;
}

export function goSourceFileTemplate(repositoryHost: string): string {
  return `https://${repositoryHost}/blob/${DEFAULT_BRANCH}{/dir}/{file}#L{line}`;
}

/**
 * go-source content
 *
 * See: https://github.com/golang/gddo/wiki/Source-Code-Links
 */
export function goSourceContent(record: VanityRecord): string {
  return [
    record.rootImportPath,
    '_',
    goSourceDirTemplate(record.repositoryHost),
    goSourceFileTemplate(record.repositoryHost),
  ].join(' ');
}

export function renderVanityPage(record: VanityRecord): string {
  return renderTemplate({
    importPath: record.importPath,
    goImport: goImportContent(record),
    goSource: goSourceContent(record),
  });
}
