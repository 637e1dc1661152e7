/**
 * Default value providers and the default applier.
 *
 * @packageDocumentation
 */

export { staticValue, computed, computedCached, noDefault } from './conditional-default.js';
export type { ConditionalDefault, DefaultComputer } from './conditional-default.js';
export { DefaultValueApplier, stringifyDefault } from './applier.js';
export type { DefaultApplicationResult, DefaultValueApplierOptions } from './applier.js';
export { DefaultApplicationInfo } from './info.js';
