/**
 * Worklog metrics: extraction and monthly aggregation
 *
 * Main exports for library use.
 */

// Schema types and validation
export * from '../schemas/index.js';

// Extraction and transport
export * from '../normalizers/index.js';
export * from '../providers/index.js';

// Core pipeline
export * from './errors.js';
export * from './config.js';
export * from './logger.js';
export * from './windows.js';
export * from './effort.js';
export * from './aggregation.js';
export * from './storage.js';
export * from './pipeline.js';
export * from './presenter.js';
export * from './reports.js';
