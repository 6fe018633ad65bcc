/**
 * @userprofile/core - Domain logic for the user profile service
 *
 * Profile validation, error normalization and the in-memory profile store.
 * The API layer consumes these; nothing here knows about HTTP.
 */

export * from './concurrency/index.js';
export * from './profiles/index.js';
