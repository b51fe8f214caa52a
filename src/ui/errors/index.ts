/**
 * Error handling for the wirecall CLI.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
