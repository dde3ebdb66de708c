/**
 * Jira provider: work-log searches per person and window
 */

export * from './types.js';
export * from './fetch.js';
