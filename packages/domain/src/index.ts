export * from './task.js';
export * from './errors.js';
export * from './filter.js';
export * from './policy.js';
export * from './audit.js';
export * from './views.js';
