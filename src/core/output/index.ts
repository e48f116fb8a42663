/**
 * Output Module
 */

export { StreamOutputTarget, DirectoryOutputTarget, createOutputTarget } from './writer.js';

export type { OutputHandle, OutputTarget } from './output.types.js';
