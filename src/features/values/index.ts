// Values feature: typed property values and hex color handling

export {
  clampChannel,
  colorValue,
  describeValue,
  formatHexColor,
  fromRawValue,
  numberValue,
  parseHexColor,
  pointValue,
  textValue,
  valuesEqual,
} from './utils/value-model';
export type { RawValueConversion } from './utils/value-model';
