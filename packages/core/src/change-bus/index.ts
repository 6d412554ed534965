export { ChangeBus } from './change-bus.js';
