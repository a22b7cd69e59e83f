export * from './calendar-date.js';
export * from './table.js';
export * from './values.js';
export { containsLineBreak, type ScalarKind } from './scalar.js';
export { validateDuctile, isDuctile } from './ductile.js';
export * from './registry.js';
export * from './chaperon.js';
