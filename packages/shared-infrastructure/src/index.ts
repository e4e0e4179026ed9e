/**
 * @reindexer/shared-infrastructure
 *
 * Environment loading and typed env readers shared by the reindexer packages.
 */

export * from './env/index.js';
