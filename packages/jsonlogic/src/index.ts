export { DEFAULT_DECODE_DEPTH, decodeExpressionTree, decodeJsonLogic, encodeJsonLogic, ruleSize } from './codec';
export type { JsonLogic, DecodeResult, DecodeOptions } from './codec';
export {
  v, lit, op,
  buildCondition, buildIn, buildAnd, buildOr, buildNot, buildIf
} from './builders';
