export * from './planning.js';
export * from './execution.js';
export * from './correction.js';
export * from './document.js';
