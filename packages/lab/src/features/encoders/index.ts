export type { Encoder, EncoderDefinition, EncoderOptions } from './types.js';
export { BaseEncoder, toNumber } from './base.js';
export { StandardScaler, MinMaxScaler, RobustScaler } from './scalers.js';
export type { StandardScalerOptions, MinMaxScalerOptions } from './scalers.js';
export { OneHotEncoder, OrdinalEncoder, LabelBinarizer, compareCategories, uniqueCategories } from './categorical.js';
export type { OneHotEncoderOptions, OrdinalEncoderOptions, HandleUnknown } from './categorical.js';
export {
  EncoderRegistry,
  defaultEncoderRegistry,
  registerEncoder,
  coerceEncoderOptions,
} from './EncoderRegistry.js';
