/**
 * Main entry point for schema exports
 */

export * from './base';
export * from './environment';
export * from './manifest';
export * from './validation';
