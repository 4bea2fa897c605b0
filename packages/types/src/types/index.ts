export * from './errors.js';
export * from './health.js';
export * from './ingest-runs.js';
export * from './reference-data.js';
