export * from './tool-result.js';
export * from './job.js';
export * from './protocol.js';
