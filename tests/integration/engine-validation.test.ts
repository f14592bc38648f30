import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RuleEngine } from '../../src/core/rule-engine.js';
import { ConfigurationError } from '../../src/validation/index.js';
import type { RuleInput } from '../../src/types/rule.js';
import { TriggerFactory, makeRule } from '../helpers/handlers.js';

describe('Engine validation', () => {
  let engine: RuleEngine;

  beforeEach(async () => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    engine = await RuleEngine.start({ name: 'validation' });
  });

  afterEach(async () => {
    await engine.dispose();
    vi.restoreAllMocks();
  });

  const setRuleError = (input: RuleInput): ConfigurationError => {
    try {
      engine.setRule(input);
    } catch (error) {
      if (error instanceof ConfigurationError) return error;
      throw error;
    }
    throw new Error('setRule() did not throw');
  };

  it('registers a valid rule', async () => {
    await engine.registerFactory(new TriggerFactory());

    const rule = engine.setRule(makeRule({ id: 'ok', name: 'Valid' }));

    expect(rule).toMatchObject({ id: 'ok', name: 'Valid', enabled: true });
    expect(engine.getStatus('ok')?.initialized).toBe(true);
  });

  it('rejects an empty rule id', () => {
    const error = setRuleError(makeRule({ id: '  ' }));

    expect(error.message).toBe('Rule validation failed');
    expect(error.statusCode).toBe(400);
    expect(error.issues).toEqual([
      { path: 'id', message: 'Field "id" cannot be empty', severity: 'error' },
    ]);
    expect(engine.getRules()).toEqual([]);
  });

  it('rejects duplicate module ids across lists', () => {
    const error = setRuleError({
      id: 'dup',
      triggers: [{ id: 'm', type: 'test.trigger' }],
      actions: [{ id: 'm', type: 'log' }],
    });

    expect(error.details).toEqual([
      { path: 'actions[0].id', message: 'Duplicate module id: m', severity: 'error' },
    ]);
  });

  it('rejects a module type without a system type', () => {
    const error = setRuleError({
      id: 'typeless',
      triggers: [{ id: 't', type: ':daily' }],
    });

    expect(error.issues).toEqual([
      { path: 'triggers[0].type', message: 'Module type cannot start with ":": :daily', severity: 'error' },
    ]);
  });

  it('rejects an input connected twice', () => {
    const error = setRuleError({
      id: 'twice',
      triggers: [{ id: 't', type: 'test.trigger' }],
      actions: [{
        id: 'a',
        type: 'log',
        connections: [
          { inputName: 'x', sourceModuleId: 't', sourceOutputName: 'one' },
          { inputName: 'x', sourceModuleId: 't', sourceOutputName: 'two' },
        ],
      }],
    });

    expect(error.issues).toEqual([{
      path: 'actions[0].connections[1].inputName',
      message: 'Input "x" is connected more than once',
      severity: 'error',
    }]);
  });

  it('keeps the previous definition when a replacement is invalid', async () => {
    const triggers = new TriggerFactory();
    await engine.registerFactory(triggers);
    engine.setRule(makeRule({ id: 'r1', name: 'First' }));

    expect(() => engine.setRule(makeRule({ id: 'r1', tags: [''], scope: ' ' }))).toThrow(ConfigurationError);

    expect(engine.getRule('r1')?.name).toBe('First');
    expect(engine.getStatus('r1')?.initialized).toBe(true);
    expect(triggers.live).toHaveLength(1);
  });

  it('validateRule() reports errors and warnings without registering', () => {
    const result = engine.validateRule({ id: 'quiet', actions: 'nope' });

    expect(result).toEqual({
      valid: false,
      errors: [{ path: 'actions', message: 'Field must be an array of action modules', severity: 'error' }],
      warnings: [{ path: 'triggers', message: 'Rule has no triggers and will never fire', severity: 'warning' }],
    });
    expect(engine.getRule('quiet')).toBeUndefined();
  });

  it('validateRule() rejects non-objects', () => {
    expect(engine.validateRule(null).errors).toEqual([
      { path: '(root)', message: 'Rule must be an object', severity: 'error' },
    ]);
  });

  it('accepts a dangling connection and reports it on the status instead', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    engine.setRule({
      id: 'dangling',
      triggers: [{ id: 't', type: 'test.trigger' }],
      actions: [{
        id: 'a',
        type: 'log',
        connections: [{ inputName: 'x', sourceModuleId: 'ghost', sourceOutputName: 'out' }],
      }],
    });

    expect(engine.getRule('dangling')).toBeDefined();
    expect(engine.getStatus('dangling')?.initialized).toBe(false);
  });
});
