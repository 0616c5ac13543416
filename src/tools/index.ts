/**
 * Tool System - Module exports
 */

export * from './types.js';
export { ToolRegistry } from './registry.js';
export * from './skill-tools.js';
