import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RuleEngine } from '../../src/core/rule-engine.js';
import type { RuleStatus } from '../../src/types/status.js';
import { TriggerFactory, makeRule } from '../helpers/handlers.js';

describe('RuleEngine lifecycle', () => {
  let engine: RuleEngine;

  beforeEach(async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    engine = await RuleEngine.start({ name: 'lifecycle' });
  });

  afterEach(async () => {
    await engine.dispose();
    vi.restoreAllMocks();
  });

  describe('start()', () => {
    it('starts with empty state', () => {
      expect(engine.isDisposed).toBe(false);
      expect(engine.getStats()).toEqual({
        rulesCount: 0,
        initializedRulesCount: 0,
        factoriesCount: 0,
        moduleTypesCount: 0,
        firingsReceived: 0,
        rulesExecuted: 0,
        executionFailures: 0,
        avgProcessingTimeMs: 0,
        factoryEventsProcessed: 0,
        tracing: { enabled: false, entriesCount: 0, maxEntries: 10_000 },
      });
    });

    it('applies tracing configuration', async () => {
      const traced = await RuleEngine.start({ tracing: { enabled: true, maxEntries: 50 } });

      expect(traced.getStats().tracing).toEqual({ enabled: true, entriesCount: 0, maxEntries: 50 });
      await traced.dispose();
    });
  });

  describe('rules', () => {
    it('stores rules and reports them through queries', () => {
      engine.setRule(makeRule({ id: 'r1', tags: ['light'], scope: 'hue' }));
      engine.setRule(makeRule({ id: 'r2', tags: ['heating'], scope: 'zwave' }));
      engine.setRule(makeRule({ id: 'r3' }));

      expect(engine.getRule('r1')?.tags).toEqual(['light']);
      expect(engine.getRules().map(r => r.id)).toEqual(['r1', 'r2', 'r3']);
      expect(engine.getRulesByTag('light').map(r => r.id)).toEqual(['r1']);
      expect(engine.getRulesByTag().map(r => r.id)).toEqual(['r1', 'r2', 'r3']);
      expect(engine.getRulesByTags(['light', 'heating']).map(r => r.id)).toEqual(['r1', 'r2']);
      expect(engine.getScopeIds()).toEqual(['hue', 'zwave']);
    });

    it('keeps a rule without handlers uninitialized', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      engine.setRule(makeRule({ id: 'r1', enabled: false }));

      expect(engine.getStatus('r1')).toEqual({
        initialized: false,
        enabled: false,
        running: false,
        errors: [{
          code: 'MISSING_HANDLER',
          category: 'binding',
          message: 'Missing handler: test.trigger, for modules: trigger',
          moduleType: 'test.trigger',
          moduleIds: ['trigger'],
        }],
      });
    });

    it('getStatus() returns a snapshot callers cannot alter', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      engine.setRule(makeRule({ id: 'r1' }));
      const status = engine.getStatus('r1');
      if (!status) throw new Error('status missing');

      Reflect.set(status.errors, 'length', 0);
      Reflect.set(status, 'initialized', true);

      expect(engine.getStatus('r1')).toMatchObject({
        initialized: false,
        errors: [{ code: 'MISSING_HANDLER', moduleType: 'test.trigger' }],
      });
    });

    it('setEnabled() flips the flag and rejects unknown rules', async () => {
      await engine.registerFactory(new TriggerFactory());
      engine.setRule(makeRule({ id: 'r1' }));

      expect(engine.setEnabled('r1', false)).toBe(true);
      expect(engine.getStatus('r1')).toMatchObject({ initialized: true, enabled: false });
      expect(engine.setEnabled('missing', false)).toBe(false);
    });

    it('keeps the live enabled flag when a rule is replaced', async () => {
      await engine.registerFactory(new TriggerFactory());
      engine.setRule(makeRule({ id: 'r1' }));
      engine.setEnabled('r1', false);

      engine.setRule(makeRule({ id: 'r1', name: 'Renamed' }));

      expect(engine.getStatus('r1')).toMatchObject({ initialized: true, enabled: false });
      expect(engine.getRule('r1')?.name).toBe('Renamed');
    });

    it('releases handlers of a replaced definition', async () => {
      const triggers = new TriggerFactory();
      await engine.registerFactory(triggers);
      engine.setRule(makeRule({ id: 'r1' }));
      const first = triggers.trigger('r1', 'trigger');

      engine.setRule(makeRule({ id: 'r1' }));

      expect(first.callback).toBeNull();
      expect(triggers.live).toHaveLength(1);
      expect(triggers.trigger('r1', 'trigger')).not.toBe(first);
    });

    it('removeRule() leaves no residue', async () => {
      const triggers = new TriggerFactory();
      await engine.registerFactory(triggers);
      const rule = engine.setRule(makeRule({ id: 'r1', tags: ['light'], scope: 'hue' }));
      const trigger = triggers.trigger('r1', 'trigger');
      const callback = trigger.callback;

      expect(engine.removeRule('r1')).toBe(rule);

      expect(engine.getRule('r1')).toBeUndefined();
      expect(engine.getStatus('r1')).toBeUndefined();
      expect(engine.getRulesByTag('light')).toEqual([]);
      expect(engine.getScopeIds()).toEqual([]);
      expect(trigger.callback).toBeNull();
      expect(triggers.live).toEqual([]);
      await expect(callback?.triggered('trigger', {})).resolves.toMatchObject({
        outcome: 'ignored',
        reason: 'rule_removed',
      });

      // Rule is gone from the type index - a new factory binds nothing
      const later = new TriggerFactory();
      await engine.registerFactory(later);
      expect(later.created).toEqual([]);
    });

    it('removeRule() returns undefined for an unknown rule', () => {
      expect(engine.removeRule('missing')).toBeUndefined();
    });

    it('validateRule() checks input without registering', () => {
      const result = engine.validateRule({ id: '' });

      expect(result.valid).toBe(false);
      expect(engine.getRules()).toEqual([]);
    });
  });

  describe('status listeners', () => {
    it('reports every status transition', async () => {
      const calls: Array<[string, RuleStatus | undefined]> = [];
      const unsubscribe = engine.onStatusChange((ruleId, status) => calls.push([ruleId, status]));
      await engine.registerFactory(new TriggerFactory());

      engine.setRule(makeRule({ id: 'r1' }));
      engine.setEnabled('r1', false);
      engine.removeRule('r1');
      unsubscribe();
      engine.setRule(makeRule({ id: 'r2' }));

      expect(calls).toEqual([
        ['r1', { initialized: false, enabled: true, running: false, errors: [] }],
        ['r1', { initialized: true, enabled: true, running: false, errors: [] }],
        ['r1', { initialized: true, enabled: false, running: false, errors: [] }],
        ['r1', undefined],
      ]);
    });
  });

  describe('dispose()', () => {
    it('is idempotent', async () => {
      await engine.dispose();
      await engine.dispose();

      expect(engine.isDisposed).toBe(true);
    });

    it('releases every rule and rejects further mutations', async () => {
      const triggers = new TriggerFactory();
      await engine.registerFactory(triggers);
      engine.setRule(makeRule({ id: 'r1' }));
      const trigger = triggers.trigger('r1', 'trigger');
      const callback = trigger.callback;

      await engine.dispose();

      expect(trigger.callback).toBeNull();
      expect(triggers.live).toEqual([]);
      expect(engine.getRules()).toEqual([]);
      expect(engine.getStatus('r1')).toBeUndefined();
      expect(engine.getFactoryTypes()).toEqual([]);
      expect(() => engine.setRule(makeRule({ id: 'r2' }))).toThrow('RuleEngine "lifecycle" is disposed');
      expect(() => engine.registerFactory(triggers)).toThrow('RuleEngine "lifecycle" is disposed');
      await expect(callback?.triggered('trigger', {})).resolves.toMatchObject({
        outcome: 'ignored',
        reason: 'engine_disposed',
      });
    });
  });
});
