export * from './spec-translator.js';
