/**
 * Types Index
 */

export * from './platform.js';
export * from './tool.js';
export * from './report.js';
export * from './config.js';
export * from './cli.js';
