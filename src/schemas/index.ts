export * from './tool-input.schema.js';
export * from './protocol.schema.js';
export * from './job-config.schema.js';
