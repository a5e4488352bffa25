/**
 * ESTIMATOR MODULE — Index
 */

export * from './estimator.types.js';
export {
  compareEstimates,
  comboSelections,
  defaultEstimator,
  estimate,
  estimateCombo,
  estimateKey,
  estimateSp,
  failClosed,
  fieldWinProbabilities,
  isValidProbability,
  rankEstimates,
  spSelections,
  topRunners,
} from './services/estimator.service.js';
export {
  CalibratedPayoutModel,
  DEFAULT_CALIBRATION_PATH,
  loadPayoutCalibration,
  payoutCalibrationSchema,
  raceCalibrationSchema,
  type PayoutCalibration,
  type RaceCalibration,
  type RunnerProbabilities,
} from './services/payout.model.js';
