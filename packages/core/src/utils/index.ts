export { isEqual, type EqualityFn } from './equality.js';
