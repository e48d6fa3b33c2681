export {
  PLM_PLAIN_EXPONENT_LIMIT,
  PLM_PRECISION,
  PlmDecimal,
  compareFractions,
  decimalToFraction,
  divideFractions,
  fractionSign,
  fractionToDecimal,
  fractionsEqual,
  integerFraction,
  makeFraction,
  multiplyFractions,
  toPlmDecimal,
  type DecimalLike,
  type Fraction,
} from './decimal.js';
export {
  DivisionByZeroError,
  InputTypeError,
  InvalidHexError,
  NonPositiveBlockError,
  TransformInputError,
  type TransformField,
} from './errors.js';
export { isHexString, parseHexAsInteger, toHexString } from './hex.js';
export {
  createTransformInputs,
  deriveC,
  describeInputs,
  toDecimal,
  toInteger,
  updateInputs,
  type IntegerLike,
  type TransformInputs,
  type TransformInputsInit,
  type TransformInputsPatch,
} from './inputs.js';
export {
  computeC,
  computeRatio,
  computeRatioFraction,
  computeSecretFraction,
  computeSecretValue,
  deriveY,
} from './transform.js';
