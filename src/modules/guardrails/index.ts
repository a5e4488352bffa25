/**
 * GUARDRAILS MODULE — Index
 */

export * from './guardrails.types.js';
export { isHandicapRace, normalizeText, selectOverroundCeiling } from './overround.policy.js';
export {
  buildVerdict,
  checkComboEstimate,
  checkEstimate,
  checkFreshness,
  checkOverround,
  checkSpEstimate,
  computeEvGlobal,
  evaluate,
  evaluateEstimates,
  evaluateGlobal,
  evaluateMarket,
} from './guardrails.service.js';
