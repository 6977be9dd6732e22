/**
 * Side-effect materialization.
 *
 * @module
 */
export { EffectPathError, validateEffectPath, resolveEffectPath } from './paths.js'
export { writeEffects } from './writer.js'
export type { WriteEffectsOptions, WriteEffectsResult } from './writer.js'
