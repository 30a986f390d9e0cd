export * from './release-track.js';
