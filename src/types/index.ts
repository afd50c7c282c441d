export * from './config.js';
export * from './artifacts.js';
export * from './manifest.js';
export * from './context.js';
