/**
 * Source clients
 *
 * Each provider module exports a query function that:
 * - Takes the resolved source config, one tracked entity and a window
 * - Requests a single bounded page
 * - Returns the raw payload or a FetchError, never throws
 */

export * from './http.js';
export * from './jira/index.js';
export * from './sonarqube/index.js';
