export * from './revisions.js';
