export { INFERRED, INFERRED_FROM_CONTEXT, UNKNOWN, isSentinelLabel } from './sentinels.js';
export type { SentinelLabel } from './sentinels.js';
export { classifyTypeNode, classifyTypeText, genericLabel, primitiveLabel } from './TypeClassifier.js';
export {
  UNKNOWN_BASIC_TYPE,
  UNKNOWN_EXPRESSION,
  basicTypeFromContext,
  basicTypeFromExpression,
  basicTypeFromTypeNode,
  basicTypeFromTypeText,
  constructorTypeName,
  methodCallName,
} from './BasicTypeExtractor.js';
export {
  inferFromContext,
  inferFromRightHandSide,
  inferLoopElementFromLine,
  inferPatternMatchFromLine,
  inferPatternMatchType,
} from './ContextInferencer.js';
export { inferExpressionType, inferLoopElementType } from './ExpressionInferencer.js';
