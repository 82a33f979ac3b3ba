import {
  COMPARISON_OPERATORS,
  UnsupportedOperatorError,
  createLogger,
  type ComparisonOperator,
  type Condition,
  type IndicatorParameters,
  type ModuleLogger
} from '@tradeloop/core';
import type { IndicatorCache } from '@tradeloop/indicators';

export const EQUALITY_TOLERANCE = 1e-10;

const NUMERIC_LITERAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

type ResolvedValue =
  | { kind: 'scalar'; value: number }
  | { kind: 'indicator'; indicator: string; indicatorParameters: IndicatorParameters };

export interface ConditionEvaluatorOptions {
  logger?: ModuleLogger;
  /** Extra fields attached to every log line, e.g. strategy id and asset. */
  context?: Record<string, unknown>;
}

const isComparisonOperator = (operator: string): operator is ComparisonOperator =>
  COMPARISON_OPERATORS.some((candidate) => candidate === operator);

export type CheckedCondition = Condition & { operator: ComparisonOperator };

export function assertOperators(
  conditions: readonly Condition[]
): asserts conditions is readonly CheckedCondition[] {
  for (const condition of conditions) {
    if (!isComparisonOperator(condition.operator)) {
      throw new UnsupportedOperatorError(condition.operator);
    }
  }
}

export const compare = (
  left: number,
  operator: ComparisonOperator,
  right: number
): boolean => {
  switch (operator) {
    case '>':
      return left > right;
    case '<':
      return left < right;
    case '>=':
      return left >= right;
    case '<=':
      return left <= right;
    case '==':
      return Math.abs(left - right) <= EQUALITY_TOLERANCE;
  }
};

const resolveValue = (value: Condition['value']): ResolvedValue => {
  if (typeof value === 'number') {
    return { kind: 'scalar', value };
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (NUMERIC_LITERAL.test(trimmed)) {
      return { kind: 'scalar', value: Number(trimmed) };
    }
    return { kind: 'indicator', indicator: trimmed, indicatorParameters: {} };
  }
  return {
    kind: 'indicator',
    indicator: value.indicator,
    indicatorParameters: value.indicatorParameters ?? {}
  };
};

/**
 * Evaluates condition lists against one asset's indicator cache. The result is
 * the AND of every condition; a condition whose series has no usable last
 * sample makes the whole list false. Unknown operators and indicators throw.
 */
export class ConditionEvaluator {
  private readonly logger: ModuleLogger;
  private readonly context: Record<string, unknown>;

  constructor(
    private readonly cache: IndicatorCache,
    options: ConditionEvaluatorOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('condition-evaluator');
    this.context = options.context ?? {};
  }

  evaluate(conditions: readonly Condition[]): boolean {
    assertOperators(conditions);

    // Every condition is resolved so that a bad indicator name surfaces even
    // when an earlier condition is already false.
    let result = true;
    for (const condition of conditions) {
      const holds = this.evaluateCondition(condition);
      result = result && holds;
    }
    return result;
  }

  private evaluateCondition(condition: CheckedCondition): boolean {
    const left = this.lastSample(
      condition.indicator,
      condition.indicatorParameters ?? {}
    );
    const resolved = resolveValue(condition.value);
    const right =
      resolved.kind === 'scalar'
        ? resolved.value
        : this.lastSample(resolved.indicator, resolved.indicatorParameters);

    if (left === null || right === null) {
      return false;
    }

    const operator = condition.operator;
    const holds = compare(left, operator, right);
    this.logger.debug('condition_evaluated', {
      ...this.context,
      indicator: condition.indicator,
      operator,
      left,
      right,
      holds
    });
    return holds;
  }

  private lastSample(indicator: string, params: IndicatorParameters): number | null {
    const series = this.cache.getOrCompute(indicator, params);
    const last = series.length ? series[series.length - 1] : undefined;
    if (last === undefined || !Number.isFinite(last)) {
      this.logger.warn('condition_series_unavailable', {
        ...this.context,
        indicator,
        params,
        length: series.length,
        reason: series.length ? 'non_finite_sample' : 'empty_series'
      });
      return null;
    }
    return last;
  }
}
