export * from './persistence/in-memory-repository.js';
