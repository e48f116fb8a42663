/**
 * Orchestration Module
 * Sequential page generation
 */

export { generateVanityPages, generatePackagePage } from './orchestrator.js';

export type {
  GenerationConfig,
  GenerationResult,
  GeneratedPage,
  GeneratorCallbacks,
} from './orchestration.types.js';
