import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RuleEngine } from '../../src/core/rule-engine.js';
import { missingHandlerError } from '../../src/types/status.js';
import type { HandlerFactory } from '../../src/types/handler.js';
import type { RuleInput } from '../../src/types/rule.js';
import { TestFactory, TestTrigger, TriggerFactory, action } from '../helpers/handlers.js';

const fooRule = (id: string): RuleInput => ({
  id,
  triggers: [{ id: 'foo', type: 'Foo' }],
});

describe('Handler factory churn', () => {
  let engine: RuleEngine;

  beforeEach(async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    engine = await RuleEngine.start({ name: 'churn' });
  });

  afterEach(async () => {
    await engine.dispose();
    vi.restoreAllMocks();
  });

  it('initializes every dependent rule in one registration pass', async () => {
    engine.setRule(fooRule('r1'));
    engine.setRule(fooRule('r2'));
    expect(engine.getStatus('r1')?.errors).toEqual([missingHandlerError('Foo', ['foo'])]);

    const foo = new TriggerFactory(['Foo']);
    await engine.registerFactory(foo);

    expect(engine.getStatus('r1')).toMatchObject({ initialized: true, errors: [] });
    expect(engine.getStatus('r2')).toMatchObject({ initialized: true, errors: [] });
    expect(foo.live.map(c => c.ruleId)).toEqual(['r1', 'r2']);
  });

  it('uninitializes every dependent rule with the same error when the factory leaves', async () => {
    const foo = new TriggerFactory(['Foo']);
    await engine.registerFactory(foo);
    engine.setRule(fooRule('r1'));
    engine.setRule(fooRule('r2'));

    await engine.unregisterFactory(foo);

    const expected = {
      initialized: false,
      enabled: true,
      running: false,
      errors: [missingHandlerError('Foo', ['foo'])],
    };
    expect(engine.getStatus('r1')).toEqual(expected);
    expect(engine.getStatus('r2')).toEqual(expected);
    expect(foo.live).toEqual([]);
    expect(engine.getFactoryTypes()).toEqual([]);
  });

  it('registering the same factory twice ends in the same state', async () => {
    const foo = new TriggerFactory(['Foo']);
    engine.setRule(fooRule('r1'));

    await engine.registerFactory(foo);
    const status = engine.getStatus('r1');
    await engine.registerFactory(foo);

    expect(engine.getStatus('r1')).toEqual(status);
    expect(foo.created).toHaveLength(1);
    expect(engine.getStats().factoriesCount).toBe(1);
  });

  it('preserves the enabled flag across a factory outage', async () => {
    const foo = new TriggerFactory(['Foo']);
    await engine.registerFactory(foo);
    engine.setRule(fooRule('r1'));
    engine.setEnabled('r1', false);

    await engine.unregisterFactory(foo);
    expect(engine.getStatus('r1')).toMatchObject({ initialized: false, enabled: false });

    await engine.registerFactory(foo);
    expect(engine.getStatus('r1')).toMatchObject({ initialized: true, enabled: false });
  });

  it('resolves sub-types through the factory of their system type', async () => {
    const foo = new TriggerFactory(['Foo']);
    engine.setRule({ id: 'r1', triggers: [{ id: 'daily', type: 'Foo:daily' }] });

    await engine.registerFactory(foo);

    expect(engine.getStatus('r1')?.initialized).toBe(true);
    expect(foo.live[0]?.module.type).toBe('Foo:daily');
  });

  it('leaves initialized rules on their factory when another one appears', async () => {
    const first = new TriggerFactory(['Foo']);
    const second = new TriggerFactory(['Foo']);
    await engine.registerFactory(first);
    engine.setRule(fooRule('r1'));

    await engine.registerFactory(second);

    expect(first.live).toHaveLength(1);
    expect(second.created).toEqual([]);
  });

  it('re-binds to the remaining factory when the active one leaves', async () => {
    const first = new TriggerFactory(['Foo']);
    const second = new TriggerFactory(['Foo']);
    await engine.registerFactory(first);
    await engine.registerFactory(second);
    engine.setRule(fooRule('r1'));
    expect(second.live).toHaveLength(1);

    const transitions: boolean[] = [];
    engine.onStatusChange((_ruleId, status) => {
      if (status) transitions.push(status.initialized);
    });

    await engine.unregisterFactory(second);

    expect(transitions).toEqual([false, true]);
    expect(engine.getStatus('r1')).toMatchObject({ initialized: true, errors: [] });
    expect(second.live).toEqual([]);
    expect(first.live).toHaveLength(1);
  });

  it('ignores the departure of a factory no rule is bound to', async () => {
    const first = new TriggerFactory(['Foo']);
    const second = new TriggerFactory(['Foo']);
    await engine.registerFactory(first);
    await engine.registerFactory(second);
    engine.setRule(fooRule('r1'));
    const listener = vi.fn();
    engine.onStatusChange(listener);

    await engine.unregisterFactory(first);

    expect(listener).not.toHaveBeenCalled();
    expect(second.live).toHaveLength(1);
  });

  it('refreshes the errors of rules that were already waiting', async () => {
    const foo = new TriggerFactory(['Foo']);
    await engine.registerFactory(foo);
    engine.setRule({
      id: 'r1',
      triggers: [{ id: 'foo', type: 'Foo' }],
      actions: [{ id: 'bar', type: 'Bar' }],
    });
    expect(engine.getStatus('r1')?.errors).toEqual([missingHandlerError('Bar', ['bar'])]);

    await engine.unregisterFactory(foo);

    expect(engine.getStatus('r1')?.errors).toEqual([
      missingHandlerError('Bar', ['bar']),
      missingHandlerError('Foo', ['foo']),
    ]);
  });

  it('de-initializes only the rules holding handlers of the departed factory', async () => {
    const foo = new TriggerFactory(['Foo']);
    const bar = new TestFactory(['Bar'], () => action(() => undefined));
    await engine.registerFactory(foo);
    await engine.registerFactory(bar);
    engine.setRule(fooRule('only-foo'));
    engine.setRule({
      id: 'both',
      triggers: [{ id: 'foo', type: 'Foo' }],
      actions: [{ id: 'bar', type: 'Bar' }],
    });

    await engine.unregisterFactory(bar);

    expect(engine.getStatus('only-foo')?.initialized).toBe(true);
    expect(engine.getStatus('both')).toMatchObject({
      initialized: false,
      errors: [missingHandlerError('Bar', ['bar'])],
    });
    expect(foo.live.map(c => c.ruleId)).toEqual(['only-foo']);
  });

  it('reports only the types no other factory serves after a removal', async () => {
    const fooOnly = new TriggerFactory(['Foo']);
    const both = new TestFactory(['Foo', 'Bar'], module =>
      module.kind === 'trigger' ? new TestTrigger(module.id) : action(() => undefined)
    );
    await engine.registerFactory(fooOnly);
    await engine.registerFactory(both);
    engine.setRule({
      id: 'r1',
      triggers: [{ id: 'foo', type: 'Foo' }],
      actions: [{ id: 'bar', type: 'Bar' }],
    });
    expect(both.live).toHaveLength(2);

    await engine.unregisterFactory(both);

    expect(engine.getStatus('r1')).toMatchObject({ initialized: false });
    expect(engine.getStatus('r1')?.errors).toEqual([missingHandlerError('Bar', ['bar'])]);
    expect(both.live).toEqual([]);
    expect(fooOnly.live).toEqual([]);
  });

  it('unbinds rules from a type a re-registered factory no longer serves', async () => {
    const types = ['A', 'B'];
    const factory = new TestFactory(types, module => new TestTrigger(module.id));
    await engine.registerFactory(factory);
    engine.setRule({ id: 'r1', triggers: [{ id: 'b', type: 'B' }] });
    expect(engine.getStatus('r1')?.initialized).toBe(true);

    types.pop();
    await engine.registerFactory(factory);

    expect(engine.getFactoryTypes()).toEqual(['A']);
    expect(engine.getStatus('r1')).toEqual({
      initialized: false,
      enabled: true,
      running: false,
      errors: [missingHandlerError('B', ['b'])],
    });
    expect(factory.live).toEqual([]);

    await engine.unregisterFactory(factory);
    expect(engine.getStatus('r1')?.initialized).toBe(false);
  });

  it('does nothing for a factory that was never registered', async () => {
    const stranger = new TriggerFactory(['Foo']);

    await expect(engine.unregisterFactory(stranger)).resolves.toBeUndefined();
    expect(engine.getStats().factoryEventsProcessed).toBe(1);
  });

  it('surfaces a factory with an invalid type to the caller', async () => {
    const broken: HandlerFactory = {
      getTypes: () => [':bad'],
      create: () => null,
    };

    await expect(engine.registerFactory(broken)).rejects.toThrow('Invalid module type id');
    expect(engine.getFactoryTypes()).toEqual([]);
  });
});
