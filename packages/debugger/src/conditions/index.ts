export { ConditionEvaluator, buildEnvironment } from './condition-evaluator.js';
export { parseCondition } from './parser.js';
export { compareValues, coerceToMatch, valuesEqual } from './compare.js';
export {
  ComparisonCondition,
  LogicalCondition,
  type Condition,
  type Environment,
  type ValueExpression,
} from './condition-nodes.js';
export { ConditionEvaluationError, ConditionErrorCode } from './errors.js';
