import { describe, expect, it } from 'vitest';
import { StrategyNotFoundError } from '@tradeloop/core';
import { InMemoryStore } from '@tradeloop/persistence';
import { StrategyStore } from './StrategyStore';

const definition = (id: string, overrides: Record<string, unknown> = {}) => ({
  id,
  title: `Strategy ${id}`,
  assets: ['BTC/USDT'],
  marketType: 'spot',
  entryConditions: [{ indicator: 'rsi', operator: '<', value: 30 }],
  exitConditions: [{ indicator: 'rsi', operator: '>', value: 70 }],
  tradeParameters: { leverage: 1, orderType: 'market', positionSize: 0.5 },
  riskParameters: { stopLossPct: 2, takeProfitPct: 4, trailingStopPct: 1 },
  ...overrides
});

describe('StrategyStore', () => {
  it('saves, loads and lists strategies', async () => {
    const strategies = new StrategyStore(new InMemoryStore());
    await strategies.save(definition('a'));
    await strategies.save(definition('b'));

    const loaded = await strategies.load('a');
    expect(loaded.active).toBe(false);
    expect(loaded.definition.tradeParameters.positionSize).toBe(0.5);
    expect(await strategies.list()).toEqual([
      { id: 'a', title: 'Strategy a', active: false },
      { id: 'b', title: 'Strategy b', active: false }
    ]);
  });

  it('returns only activated strategies', async () => {
    const strategies = new StrategyStore(new InMemoryStore());
    await strategies.save(definition('a'));
    await strategies.save(definition('b'));
    await strategies.activate('b');

    const active = await strategies.getActiveStrategies();
    expect(active.map((entry) => entry.id)).toEqual(['b']);

    await strategies.deactivate('b');
    expect(await strategies.getActiveStrategies()).toEqual([]);
  });

  it('keeps the activation flag across save and update', async () => {
    const strategies = new StrategyStore(new InMemoryStore());
    await strategies.save(definition('a'));
    await strategies.activate('a');
    await strategies.save(definition('a', { title: 'Renamed' }));
    await strategies.update('a', definition('a', { assets: ['ETH/USDT'] }));

    const loaded = await strategies.load('a');
    expect(loaded.active).toBe(true);
    expect(loaded.definition.assets).toEqual(['ETH/USDT']);
  });

  it('throws for unknown ids', async () => {
    const strategies = new StrategyStore(new InMemoryStore());
    await expect(strategies.load('missing')).rejects.toThrow(StrategyNotFoundError);
    await expect(strategies.activate('missing')).rejects.toThrow(StrategyNotFoundError);
    await expect(strategies.remove('missing')).rejects.toThrow(StrategyNotFoundError);
  });

  it('removes a strategy from the index', async () => {
    const strategies = new StrategyStore(new InMemoryStore());
    await strategies.save(definition('a'));
    await strategies.remove('a');
    expect(await strategies.list()).toEqual([]);
  });

  it('reports completeness', async () => {
    const strategies = new StrategyStore(new InMemoryStore());
    await strategies.save(definition('full'));
    await strategies.save(definition('entry-only', { exitConditions: [] }));

    expect(await strategies.isComplete('full')).toBe(true);
    expect(await strategies.isComplete('entry-only')).toBe(false);
    expect(await strategies.isComplete('missing')).toBe(false);
  });
});
