/**
 * @setsplit/shared-infrastructure
 *
 * Environment parsing helpers shared by the setsplit packages.
 */

export * from './env/loaders.js';
