/**
 * Filesystem command tree loader: discovery, implementation loading, release-track
 * resolution and YAML specs with shared common data.
 */

// Configuration
export * from './core/config/index.js';

// Release tracks
export * from './core/tracks/index.js';

// Discovery, loading and resolution
export * from './core/tree/index.js';

// Spec translation
export * from './core/translate/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
