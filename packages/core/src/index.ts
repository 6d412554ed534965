// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Utilities
export * from './utils/index.js';

// Value adapters
export * from './adapters/index.js';

// Change bus
export * from './change-bus/index.js';

// Stored values
export * from './stored-value/index.js';

// Combinator
export * from './combinator/index.js';

// Rate guard
export * from './rate-guard/index.js';

// Streaming store and session
export * from './streaming-store/index.js';
