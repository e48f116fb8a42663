/**
 * Shared constants across the application
 */

// ============================================================================
// File Names
// ============================================================================

export const INDEX_HTML = 'index.html';

// ============================================================================
// Go Workspace Layout
// ============================================================================

export const SOURCE_DIR = 'src';
export const DEFAULT_GOPATH_DIR = 'go';
export const GO_FILE_EXTENSION = '.go';
export const GO_TEST_FILE_SUFFIX = '_test.go';

/**
 * Repository markers, probed in this order
 */
export const VCS_MARKERS = [
  { type: 'git', marker: '.git' },
  { type: 'svn', marker: '.svn' },
  { type: 'hg', marker: '.hg' },
  { type: 'bzr', marker: '.bzr' },
] as const;

// ============================================================================
// Rendering
// ============================================================================

export const DOCS_BASE_URL = 'https://godoc.org';
export const DEFAULT_BRANCH = 'master';

// ============================================================================
// Output
// ============================================================================

export const OUTPUT_DIR_MODE = 0o755;

// ============================================================================
// Rewrite Configuration
// ============================================================================

export const RULE_SEPARATOR = ',';
export const PAIR_SEPARATOR = '=';
