export {
  getStreamingStore,
  resetStreamingStoreForTesting,
  type SessionOptions,
} from './session.js';
export {
  StreamingStore,
  type CustomValueOptions,
  type StreamingStoreConfig,
  type ValueOptions,
} from './streaming-store.js';
