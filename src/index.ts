export * from './openrgb/index.js';
