/**
 * Resolver exports barrel file.
 */
export {
  resolve,
  resolveVariable,
  acceptAnswer,
  isAsked,
  computeDefault,
  selectFiles,
  render,
  renderPath,
  ScaffoldResolver,
} from './resolver.js';
export type { ResolvedConfig, ResolveOptions } from './resolver.js';
export { coerceAnswer } from './coerce.js';
export { checkConstraint, satisfies, describeConstraint } from './constraints.js';
