export { commitWrite } from './commit.js';
export { dedupe } from './dedupe.js';
export {
  StoredValue,
  type StoredValueOptions,
  type SubscribeOptions,
} from './stored-value.js';
export { ValueSubscription } from './value-subscription.js';
