/**
 * SonarQube provider: measures, metric history and open issues per project
 */

export * from './types.js';
export * from './fetch.js';
