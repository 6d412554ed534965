export {
  RateGuard,
  createRateGuard,
  type RateGuardConfig,
  type RateGuardDiagnostic,
} from './rate-guard.js';
