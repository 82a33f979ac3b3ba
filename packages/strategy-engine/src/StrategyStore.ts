import {
  StrategyNotFoundError,
  createLogger,
  type StrategyDefinition
} from '@tradeloop/core';
import type { KeyValueStore } from '@tradeloop/persistence';

import { validateStrategyDefinition } from './validation';

const logger = createLogger('strategy-store');

export const STRATEGY_INDEX_KEY = 'strategies';
export const strategyKey = (strategyId: string): string => `strategy:${strategyId}`;

export interface StrategySummary {
  id: string;
  title: string;
  active: boolean;
}

export interface StoredStrategy extends StrategySummary {
  definition: StrategyDefinition;
}

/**
 * Strategy definitions and their activation flag, one hash per strategy plus
 * an index set of ids.
 */
export class StrategyStore {
  constructor(private readonly store: KeyValueStore) {}

  async save(input: unknown): Promise<StrategyDefinition> {
    const definition = validateStrategyDefinition(input);
    const existing = await this.store.hgetall(strategyKey(definition.id));
    await this.store.commit([
      {
        op: 'hset',
        key: strategyKey(definition.id),
        fields: {
          id: definition.id,
          title: definition.title,
          definition: JSON.stringify(definition),
          active: existing?.active ?? 'false'
        }
      },
      { op: 'sadd', key: STRATEGY_INDEX_KEY, member: definition.id }
    ]);
    logger.info('strategy_saved', { strategyId: definition.id, title: definition.title });
    return definition;
  }

  /** Replace an existing definition; the activation flag is kept. */
  async update(strategyId: string, input: unknown): Promise<StrategyDefinition> {
    await this.requireRecord(strategyId);
    const definition = validateStrategyDefinition(input);
    if (definition.id !== strategyId) {
      throw new Error(`Cannot change strategy id from "${strategyId}" to "${definition.id}"`);
    }
    await this.store.hset(strategyKey(strategyId), {
      title: definition.title,
      definition: JSON.stringify(definition)
    });
    logger.info('strategy_updated', { strategyId });
    return definition;
  }

  async load(strategyId: string): Promise<StoredStrategy> {
    return this.decode(strategyId, await this.requireRecord(strategyId));
  }

  async list(): Promise<StrategySummary[]> {
    const ids = await this.store.smembers(STRATEGY_INDEX_KEY);
    const summaries: StrategySummary[] = [];
    for (const id of ids) {
      const record = await this.store.hgetall(strategyKey(id));
      if (!record) {
        continue;
      }
      summaries.push({ id, title: record.title ?? id, active: record.active === 'true' });
    }
    return summaries;
  }

  async activate(strategyId: string): Promise<void> {
    await this.setActive(strategyId, true);
  }

  async deactivate(strategyId: string): Promise<void> {
    await this.setActive(strategyId, false);
  }

  async remove(strategyId: string): Promise<void> {
    await this.requireRecord(strategyId);
    await this.store.commit([
      { op: 'del', key: strategyKey(strategyId) },
      { op: 'srem', key: STRATEGY_INDEX_KEY, member: strategyId }
    ]);
    logger.info('strategy_removed', { strategyId });
  }

  async getActiveStrategies(): Promise<StrategyDefinition[]> {
    const summaries = await this.list();
    const active: StrategyDefinition[] = [];
    for (const summary of summaries.filter((entry) => entry.active)) {
      active.push((await this.load(summary.id)).definition);
    }
    return active;
  }

  /**
   * A strategy can trade once it has assets plus at least one entry and one
   * exit condition. Unknown ids are incomplete rather than an error.
   */
  async isComplete(strategyId: string): Promise<boolean> {
    const record = await this.store.hgetall(strategyKey(strategyId));
    if (!record) {
      logger.warn('strategy_not_found', { strategyId });
      return false;
    }
    const { definition } = this.decode(strategyId, record);
    return (
      definition.assets.length > 0 &&
      definition.entryConditions.length > 0 &&
      definition.exitConditions.length > 0
    );
  }

  private async setActive(strategyId: string, active: boolean): Promise<void> {
    await this.requireRecord(strategyId);
    await this.store.hset(strategyKey(strategyId), { active: String(active) });
    logger.info(active ? 'strategy_activated' : 'strategy_deactivated', { strategyId });
  }

  private async requireRecord(strategyId: string): Promise<Record<string, string>> {
    const record = await this.store.hgetall(strategyKey(strategyId));
    if (!record) {
      logger.error('strategy_not_found', { strategyId });
      throw new StrategyNotFoundError(strategyId);
    }
    return record;
  }

  private decode(strategyId: string, record: Record<string, string>): StoredStrategy {
    const raw: unknown = JSON.parse(record.definition ?? 'null');
    const definition = validateStrategyDefinition(raw);
    return {
      id: strategyId,
      title: record.title ?? definition.title,
      active: record.active === 'true',
      definition
    };
  }
}
