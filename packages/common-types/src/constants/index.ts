/**
 * Constants Barrel Export
 *
 * Re-exports all domain-separated constants from a single entry point.
 */

// Discord constants
export { TEXT_INPUT_LIMITS, MODAL_LIMITS } from './discord.js';
