export { executeCommand } from './command-executor.js';
export * as messages from './messages.js';
