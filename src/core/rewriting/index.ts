/**
 * Rewriting Module
 * Canonical-to-hosting path substitution
 */

export { PathRewriter } from './pathRewriter.js';
export type { RewriteRule } from './pathRewriter.js';
