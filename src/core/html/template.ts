/**
 * Vanity Page Template
 */

import { DOCS_BASE_URL } from '../../utils/constants.js';

export interface TemplateFields {
  importPath: string;
  goImport: string;
  goSource: string;
}

/**
 * Escapes a value for use inside a double-quoted attribute or text
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Fills the page: go-import and go-source tags for the go tool, plus a
 * redirect to the package documentation for browsers.
 */
export function renderTemplate(fields: TemplateFields): string {
  const importPath = escapeHtml(fields.importPath);
  const docsUrl = `${DOCS_BASE_URL}/${importPath}`;

  return `<!DOCTYPE html>
<html>
<head>
<meta http-equiv="Content-Type" content="text/html; charset=utf-8"/>
<meta name="go-import" content="${escapeHtml(fields.goImport)}">
<meta name="go-source" content="${escapeHtml(fields.goSource)}">
<meta http-equiv="refresh" content="0; url=${docsUrl}">
</head>
<body>
Nothing to see here; <a href="${docsUrl}">move along</a>.
</body>
</html>
`;
}
