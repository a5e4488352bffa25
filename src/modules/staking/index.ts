/**
 * STAKING MODULE — Index
 */

export * from './staking.types.js';
export { clamp, floorToIncrement, kellyFraction } from './kelly.js';
export {
  allocate,
  rawKellyStake,
  runnerExposure,
  selectLegs,
  ticketId,
  totalStake,
  validatePolicy,
} from './allocator.service.js';
