export {
  CombinedSubscription,
  combineLatestValues,
  combineValues,
  type CombineOptions,
  type StoredValues,
} from './combine-values.js';
export { ValueCombinator } from './value-combinator.js';
