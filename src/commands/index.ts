/**
 * Command exports
 */

export { showVersionsCommand, EXIT_FAILURE, EXIT_INTERNAL } from './show-versions.js';
