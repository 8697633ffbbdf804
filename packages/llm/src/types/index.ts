export * from './message.js';
export * from './stream.js';
export * from './result.js';
export * from './tool.js';
export * from './config.js';
export * from './error.js';
