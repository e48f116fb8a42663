/**
 * Input Module
 */

export { readLines, readPackageIdentifiers } from './reader.js';
