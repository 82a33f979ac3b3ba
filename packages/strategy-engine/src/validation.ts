import {
  COMPARISON_OPERATORS,
  MARKET_TYPES,
  StrategyValidationError,
  parseTimeframe,
  type Condition,
  type IndicatorParameters,
  type IndicatorReference,
  type MarketType,
  type PositionType,
  type StrategyDefinition
} from '@tradeloop/core';

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Reads `camelKey`, falling back to its snake_case spelling. */
const pick = (source: RawRecord, camelKey: string): unknown => {
  if (camelKey in source) {
    return source[camelKey];
  }
  const snakeKey = camelKey.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
  return source[snakeKey];
};

const toNumber = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const isMarketType = (value: unknown): value is MarketType =>
  MARKET_TYPES.some((type) => type === value);

const isPositionType = (value: unknown): value is PositionType =>
  value === 'long' || value === 'short';

const readParameters = (
  value: unknown,
  path: string,
  issues: string[]
): IndicatorParameters | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRecord(value)) {
    issues.push(`${path} must be an object`);
    return undefined;
  }
  const params: IndicatorParameters = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'number' || typeof entry === 'string' || typeof entry === 'boolean') {
      params[key] = entry;
    } else {
      issues.push(`${path}.${key} must be a scalar`);
    }
  }
  return params;
};

const readConditionValue = (
  value: unknown,
  path: string,
  issues: string[]
): Condition['value'] | null => {
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (isRecord(value) && typeof value.indicator === 'string') {
    const reference: IndicatorReference = { indicator: value.indicator };
    const params = readParameters(pick(value, 'indicatorParameters'), `${path}.indicatorParameters`, issues);
    if (params) {
      reference.indicatorParameters = params;
    }
    return reference;
  }
  issues.push(`${path} must be a number, a string or an indicator reference`);
  return null;
};

const readConditions = (value: unknown, path: string, issues: string[]): Condition[] => {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    issues.push(`${path} must be an array`);
    return [];
  }

  const conditions: Condition[] = [];
  value.forEach((entry: unknown, index) => {
    const at = `${path}[${index}]`;
    if (!isRecord(entry)) {
      issues.push(`${at} must be an object`);
      return;
    }
    const indicator = entry.indicator;
    const operator = entry.operator;
    if (typeof indicator !== 'string' || indicator.trim() === '') {
      issues.push(`${at}.indicator must be a non-empty string`);
      return;
    }
    if (typeof operator !== 'string' || !COMPARISON_OPERATORS.some((op) => op === operator)) {
      issues.push(`${at}.operator ${JSON.stringify(operator)} is not supported`);
      return;
    }
    const conditionValue = readConditionValue(entry.value, `${at}.value`, issues);
    if (conditionValue === null) {
      return;
    }

    const condition: Condition = { indicator, operator, value: conditionValue };
    const params = readParameters(pick(entry, 'indicatorParameters'), `${at}.indicatorParameters`, issues);
    if (params) {
      condition.indicatorParameters = params;
    }
    const timeframe = entry.timeframe;
    if (timeframe !== undefined) {
      if (typeof timeframe !== 'string') {
        issues.push(`${at}.timeframe must be a string`);
        return;
      }
      try {
        parseTimeframe(timeframe);
      } catch (error) {
        issues.push(`${at}.timeframe: ${error instanceof Error ? error.message : String(error)}`);
        return;
      }
      condition.timeframe = timeframe;
    }
    conditions.push(condition);
  });
  return conditions;
};

const readNumberField = (
  source: RawRecord,
  key: string,
  path: string,
  issues: string[],
  fallback?: number
): number => {
  const raw = pick(source, key);
  if (raw === undefined && fallback !== undefined) {
    return fallback;
  }
  const value = toNumber(raw);
  if (value === null) {
    issues.push(`${path}.${key} must be numeric`);
    return 0;
  }
  if (value < 0) {
    issues.push(`${path}.${key} must not be negative`);
  }
  return value;
};

/**
 * Parses a strategy definition from JSON, accepting camelCase or snake_case
 * keys, and reports every problem at once.
 * @throws StrategyValidationError
 */
export const validateStrategyDefinition = (input: unknown): StrategyDefinition => {
  const issues: string[] = [];
  if (!isRecord(input)) {
    throw new StrategyValidationError('<unknown>', ['definition must be an object']);
  }

  const id = typeof input.id === 'string' ? input.id.trim() : '';
  if (!id) {
    issues.push('id must be a non-empty string');
  }
  const title = typeof input.title === 'string' && input.title.trim() ? input.title : id;

  const rawAssets = input.assets;
  const assets = Array.isArray(rawAssets)
    ? [...new Set(rawAssets.filter((asset): asset is string => typeof asset === 'string' && asset.trim() !== '').map((asset) => asset.trim()))]
    : [];
  if (!assets.length) {
    issues.push('assets must list at least one symbol');
  }

  const marketType = pick(input, 'marketType');
  if (!isMarketType(marketType)) {
    issues.push(`marketType ${JSON.stringify(marketType)} must be one of ${MARKET_TYPES.join(', ')}`);
  }

  const entryConditions = readConditions(pick(input, 'entryConditions'), 'entryConditions', issues);
  const exitConditions = readConditions(pick(input, 'exitConditions'), 'exitConditions', issues);

  const rawTrade = pick(input, 'tradeParameters');
  const trade = isRecord(rawTrade) ? rawTrade : {};
  if (!isRecord(rawTrade)) {
    issues.push('tradeParameters must be an object');
  }
  const orderType = pick(trade, 'orderType');
  const positionType = pick(trade, 'positionType');
  if (positionType !== undefined && !isPositionType(positionType)) {
    issues.push('tradeParameters.positionType must be long or short');
  }

  const rawRisk = pick(input, 'riskParameters');
  const risk = isRecord(rawRisk) ? rawRisk : {};

  const definition: StrategyDefinition = {
    id,
    title,
    assets,
    marketType: isMarketType(marketType) ? marketType : 'spot',
    entryConditions,
    exitConditions,
    tradeParameters: {
      leverage: readNumberField(trade, 'leverage', 'tradeParameters', issues, 1),
      orderType: typeof orderType === 'string' && orderType.trim() ? orderType.trim() : 'market',
      positionSize: readNumberField(trade, 'positionSize', 'tradeParameters', issues)
    },
    riskParameters: {
      stopLossPct: readNumberField(risk, 'stopLossPct', 'riskParameters', issues, 0),
      takeProfitPct: readNumberField(risk, 'takeProfitPct', 'riskParameters', issues, 0),
      trailingStopPct: readNumberField(risk, 'trailingStopPct', 'riskParameters', issues, 0)
    }
  };
  if (isPositionType(positionType)) {
    definition.tradeParameters.positionType = positionType;
  }

  if (issues.length) {
    throw new StrategyValidationError(id || '<unknown>', issues);
  }
  return definition;
};
