export { DateAdapter } from './date-adapter.js';
export { EnumAdapter } from './enum-adapter.js';
export { JsonAdapter, type JsonAdapterOptions } from './json-adapter.js';
export { KeysAdapter } from './keys-adapter.js';
export {
  BoolAdapter,
  DoubleAdapter,
  IntAdapter,
  StringAdapter,
  StringListAdapter,
} from './primitive-adapters.js';
export type { ValueAdapter } from './value-adapter.js';
