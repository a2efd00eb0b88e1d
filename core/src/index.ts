export * from './errors/index.js';
export * from './logger.js';
export * from './env-loader.js';
export * from './interval.js';
export * from './time.js';
export * from './markup/redactor.js';
export * from './document/types.js';
export * from './document/annotation-store.js';
export * from './document/validate.js';
export * from './document/eaf-parser.js';
export * from './document/eaf-writer.js';
export * from './document/eaf-io.js';
export * from './redaction/orchestrator.js';
export * from './oral/session-reader.js';
export * from './oral/oral-document.js';
export * from './oral/timeline-merger.js';
