export {
  estimateTokens,
  createTokenEstimator,
  ESTIMATION_METHODS,
  XPATH_PATTERN,
  type TokenEstimator,
  type EstimationMethod,
} from './estimator.js';
