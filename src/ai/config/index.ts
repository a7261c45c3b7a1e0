/**
 * AI Configuration Index
 *
 * To add a new prompt-driven AI task:
 * 1. Create a new file in this folder (e.g., 'course-summary.ts')
 * 2. Define the config following the AITaskConfig interface
 * 3. Export it from this index file
 */

// Types
export * from './types';

// Utilities
export * from './utils';

// Configurations
export { webResearchConfig, formatSourceDigest } from './web-research';
export { labDiscoveryConfig, buildLabSearchPrompt } from './lab-discovery';

// Pipeline constants
export * from './pipeline';
