export * from './profile.schema.js';
