import { describe, expect, it, vi } from 'vitest';

import { defineFlags } from '../src/core/flag-space.js';
import { HandlerRegistry } from '../src/core/registry.js';
import { CircularDependencyError, InvalidHandlerResultError } from '../src/errors/errors.js';
import type { BuildResult } from '../src/types/types.js';

type Listener = { ListenerArn: string };

const albRegistry = () => {
  const FLAGS = defineFlags('BASE', 'LISTENERS', 'RULES');
  const { BASE, LISTENERS, RULES } = FLAGS.flags;
  const calls: string[] = [];
  const registry = new HandlerRegistry(FLAGS);

  registry.register({ flag: BASE }, function base() {
    calls.push('base');
    return { region: 'us-east-1', _version: 1 };
  });
  registry.register({ flag: LISTENERS, key: 'listeners' }, function listeners(): Listener[] {
    calls.push('listeners');
    return [{ ListenerArn: 'x' }];
  });
  registry.register(
    { flag: RULES, dependsOn: LISTENERS, key: 'rules' },
    function rules(alb: { listeners: Listener[] }) {
      calls.push('rules');
      return alb.listeners.map(() => ({ rule: 'y' }));
    }
  );

  return { FLAGS, registry, calls };
};

describe('HandlerRegistry.build', () => {
  it('builds the full structure on top of a caller-supplied object', () => {
    const { FLAGS, registry, calls } = albRegistry();
    const start = { Arn: 'abc' };

    const result = registry.build(FLAGS.ALL, { startWith: start });

    expect(result).toBe(start);
    expect(result).toEqual({
      Arn: 'abc',
      region: 'us-east-1',
      _version: 1,
      listeners: [{ ListenerArn: 'x' }],
      rules: [{ rule: 'y' }],
    });
    expect(calls).toEqual(['base', 'listeners', 'rules']);
  });

  it('pulls in a dependency that was not requested', () => {
    const { FLAGS, registry, calls } = albRegistry();

    const result = registry.build(FLAGS.flags.RULES);

    expect(calls).toEqual(['listeners', 'rules']);
    expect(result).toEqual({
      listeners: [{ ListenerArn: 'x' }],
      rules: [{ rule: 'y' }],
    });
  });

  it('produces identical output for repeated builds', () => {
    const { FLAGS, registry } = albRegistry();

    const first = registry.build(FLAGS.ALL);
    const second = registry.build(FLAGS.ALL);

    expect(second).not.toBe(first);
    expect(second).toEqual(first);
  });

  it('returns an empty structure for NONE without calling anything', () => {
    const { FLAGS, registry, calls } = albRegistry();

    expect(registry.build(FLAGS.NONE)).toEqual({});
    expect(calls).toEqual([]);
  });

  it('merges colliding keys last-write-wins in registration order', () => {
    const FLAGS = defineFlags('A', 'B', 'C');
    const registry = new HandlerRegistry(FLAGS);
    registry.register({ flag: FLAGS.flags.A }, () => ({ shared: 1, a: true }));
    registry.register({ flag: FLAGS.flags.B }, () => ({ shared: 2 }));
    registry.register({ flag: FLAGS.flags.C, key: 'name' }, () => 'from-c');

    const result = registry.build(FLAGS.ALL, { startWith: { name: 'initial', shared: 0 } });

    expect(result).toEqual({ shared: 2, a: true, name: 'from-c' });
  });

  it('hands dependents the structure already holding their dependencies', () => {
    const FLAGS = defineFlags('PEOPLE', 'HOBBIES');
    const { PEOPLE, HOBBIES } = FLAGS.flags;
    const registry = new HandlerRegistry(FLAGS);
    const hobbies: Record<string, string[]> = {
      '123': ['mountain biking', 'skiing'],
      '234': ['snail collecting'],
    };

    registry.register({ flag: HOBBIES, dependsOn: PEOPLE, key: 'hobbies' }, (result: BuildResult) => {
      const people = result.people as Record<string, string>;
      return Object.fromEntries(Object.entries(people).map(([name, id]) => [name, hobbies[id]]));
    });
    registry.register({ flag: PEOPLE, key: 'people' }, () => ({ simon: '123', george: '234' }));

    expect(registry.build(PEOPLE)).toEqual({ people: { simon: '123', george: '234' } });

    const leafOnly = registry.build(HOBBIES);
    expect(leafOnly).toEqual({
      people: { simon: '123', george: '234' },
      hobbies: { simon: ['mountain biking', 'skiing'], george: ['snail collecting'] },
    });
    expect(registry.build(PEOPLE | HOBBIES)).toEqual(leafOnly);
  });

  it('waits for every binding behind a composite dependency', () => {
    const FLAGS = defineFlags('A', 'B', 'C', 'D');
    const { A, B, C, D } = FLAGS.flags;
    const registry = new HandlerRegistry(FLAGS);
    const seen: string[] = [];

    registry.register({ flag: D, dependsOn: B | C, key: 'd' }, (result: BuildResult) => {
      seen.push(`d:${Object.keys(result).sort().join(',')}`);
      return 'd';
    });
    registry.register({ flag: C, dependsOn: A, key: 'c' }, () => {
      seen.push('c');
      return 'c';
    });
    registry.register({ flag: B, dependsOn: A, key: 'b' }, () => {
      seen.push('b');
      return 'b';
    });
    registry.register({ flag: A, key: 'a' }, () => {
      seen.push('a');
      return 'a';
    });

    registry.build(D);

    expect(seen).toEqual(['a', 'c', 'b', 'd:a,b,c']);
  });
});

describe('HandlerRegistry.build arguments', () => {
  it('passes build arguments, adding the structure only for dependents', () => {
    const FLAGS = defineFlags('BUCKET', 'POLICY');
    const { BUCKET, POLICY } = FLAGS.flags;
    const registry = new HandlerRegistry(FLAGS);
    const conn = { region: 'eu-west-1' };
    const bucket = vi.fn((..._args: unknown[]) => ({ name: 'bucket-1' }));
    const policy = vi.fn((..._args: unknown[]) => ({ version: '2012' }));

    registry.register({ flag: BUCKET }, bucket);
    registry.register({ flag: POLICY, key: 'policy', dependsOn: BUCKET }, policy);

    const result = registry.build(FLAGS.ALL, { args: ['bucket-1', conn] });

    expect(bucket.mock.calls).toEqual([['bucket-1', conn]]);
    expect(policy.mock.calls[0]).toHaveLength(3);
    expect(policy.mock.calls[0][0]).toBe(result);
    expect(policy.mock.calls[0].slice(1)).toEqual(['bucket-1', conn]);
  });

  it('passes the structure to every handler when asked', () => {
    const FLAGS = defineFlags('WINNER');
    const registry = new HandlerRegistry(FLAGS);
    registry.register({ flag: FLAGS.flags.WINNER }, (data: { name: string }) => ({
      winner: data.name,
    }));

    const result = registry.build(FLAGS.ALL, {
      startWith: { name: 'george' },
      passStructure: true,
    });

    expect(result).toEqual({ winner: 'george', name: 'george' });
  });

  it('passes a fresh structure when no starting object is given', () => {
    const FLAGS = defineFlags('Cookies');
    const registry = new HandlerRegistry(FLAGS);
    registry.register({ flag: FLAGS.flags.Cookies }, (data: BuildResult) => ({
      cookies_remaining: Object.keys(data).length,
    }));

    expect(registry.build(FLAGS.ALL, { passStructure: true })).toEqual({ cookies_remaining: 0 });
  });

  it('never passes the structure twice when it is already an argument', () => {
    const FLAGS = defineFlags('ACK', 'REPLY');
    const { ACK, REPLY } = FLAGS.flags;
    const registry = new HandlerRegistry(FLAGS);
    const salutation = vi.fn((...args: unknown[]) => (args[0] as { hello: string }).hello);
    const reply = vi.fn((..._args: unknown[]) => 'ok');

    registry.register({ flag: ACK, key: 'salutation' }, salutation);
    registry.register({ flag: REPLY, key: 'reply', dependsOn: ACK }, reply);

    const starting = { hello: 'goodbye' };
    const result = registry.build(FLAGS.ALL, {
      args: [starting],
      startWith: starting,
      passStructure: true,
    });

    expect(salutation.mock.calls).toEqual([[starting]]);
    expect(reply.mock.calls[0]).toHaveLength(1);
    expect(result).toEqual({ hello: 'goodbye', salutation: 'goodbye', reply: 'ok' });
  });

  it('treats an empty starting object as the structure to fill', () => {
    const FLAGS = defineFlags('ONE');
    const registry = new HandlerRegistry(FLAGS);
    registry.register({ flag: FLAGS.flags.ONE }, () => ({ tanya: 'redAlert' }));

    const start = {};
    expect(registry.build(FLAGS.ALL, { startWith: start })).toBe(start);
    expect(start).toEqual({ tanya: 'redAlert' });
  });
});

describe('HandlerRegistry.build multi-output bindings', () => {
  const animals = () => {
    const FLAGS = defineFlags('PETS', 'FARM_ANIMALS', 'WILD_ANIMALS', 'ZOO');
    const registry = new HandlerRegistry(FLAGS);
    const { PETS, FARM_ANIMALS, WILD_ANIMALS } = FLAGS.flags;
    registry.register(
      { flag: [PETS, FARM_ANIMALS, WILD_ANIMALS], key: ['pets', 'farm', 'wild'] },
      function someMethod() {
        return ['cat', 'pig', 'rhino'];
      }
    );
    return { FLAGS, registry };
  };

  it('merges only the requested slots', () => {
    const { FLAGS, registry } = animals();
    const { PETS, FARM_ANIMALS } = FLAGS.flags;

    expect(registry.build(PETS | FARM_ANIMALS)).toEqual({ pets: 'cat', farm: 'pig' });
    expect(registry.build(FLAGS.ALL)).toEqual({ pets: 'cat', farm: 'pig', wild: 'rhino' });
  });

  it('merges the slot a dependent pulled in, and nothing else', () => {
    const { FLAGS, registry } = animals();
    const { WILD_ANIMALS, ZOO } = FLAGS.flags;
    registry.register({ flag: ZOO, dependsOn: WILD_ANIMALS, key: 'zoo' }, (result: BuildResult) =>
      `zoo with a ${String(result.wild)}`
    );

    expect(registry.build(ZOO)).toEqual({ wild: 'rhino', zoo: 'zoo with a rhino' });
  });

  it('merges keyless slots as mappings', () => {
    const FLAGS = defineFlags('A', 'B');
    const registry = new HandlerRegistry(FLAGS);
    registry.register({ flag: [FLAGS.flags.A, FLAGS.flags.B], key: [undefined, 'b'] }, () => [
      { x: 1, y: 2 },
      2,
    ]);

    expect(registry.build(FLAGS.ALL)).toEqual({ x: 1, y: 2, b: 2 });
  });
});

describe('HandlerRegistry.build failures', () => {
  it('rejects a cycle before any handler runs', () => {
    const FLAGS = defineFlags('ONE', 'TWO');
    const { ONE, TWO } = FLAGS.flags;
    const registry = new HandlerRegistry(FLAGS);
    const one = vi.fn(() => 1);
    const two = vi.fn(() => 2);
    registry.register({ flag: ONE, dependsOn: TWO, key: 'one' }, one);
    registry.register({ flag: TWO, dependsOn: ONE, key: 'two' }, two);

    const start = { untouched: true };
    let caught: unknown;
    try {
      registry.build(ONE | TWO, { startWith: start });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(CircularDependencyError);
    expect(caught).toMatchObject({ cycle: ['ONE', 'TWO', 'ONE'] });
    expect(one).not.toHaveBeenCalled();
    expect(two).not.toHaveBeenCalled();
    expect(start).toEqual({ untouched: true });
  });

  it('propagates handler errors as thrown, keeping earlier writes', () => {
    const FLAGS = defineFlags('FIRST', 'SECOND', 'THIRD');
    const registry = new HandlerRegistry(FLAGS);
    const boom = new Error('throttled');
    const third = vi.fn(() => 3);
    registry.register({ flag: FLAGS.flags.FIRST, key: 'first' }, () => 1);
    registry.register({ flag: FLAGS.flags.SECOND, key: 'second' }, () => {
      throw boom;
    });
    registry.register({ flag: FLAGS.flags.THIRD, key: 'third' }, third);

    const start: BuildResult = {};
    let caught: unknown;
    try {
      registry.build(FLAGS.ALL, { startWith: start });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBe(boom);
    expect(start).toEqual({ first: 1 });
    expect(third).not.toHaveBeenCalled();
  });

  it('rejects return values that cannot be merged', () => {
    const FLAGS = defineFlags('TEXT', 'LIST', 'PAIR', 'SHORT');
    const { TEXT, LIST, PAIR, SHORT } = FLAGS.flags;
    const registry = new HandlerRegistry(FLAGS);
    registry.register({ flag: TEXT }, function text() {
      return 'plain';
    });
    registry.register({ flag: LIST }, () => [1, 2]);

    expect(() => registry.build(TEXT)).toThrowError(InvalidHandlerResultError);
    expect(() => registry.build(TEXT)).toThrowError(/Handler 'text' must return a mapping to merge/);
    expect(() => registry.build(LIST)).toThrowError(InvalidHandlerResultError);

    const multi = new HandlerRegistry(FLAGS);
    multi.register({ flag: [PAIR, SHORT], key: ['pair', 'short'] }, function pair() {
      return ['only-one'];
    });
    expect(() => multi.build(PAIR)).toThrowError(/Handler 'pair' must return an array of 2 values/);
  });

  it('merges only plain objects and arrays with one value per slot', () => {
    const FLAGS = defineFlags('MAP', 'DATE', 'INSTANCE', 'BARE', 'TRIO_A', 'TRIO_B');
    const { MAP, DATE, INSTANCE, BARE, TRIO_A, TRIO_B } = FLAGS.flags;
    const registry = new HandlerRegistry(FLAGS);
    class Settings {
      region = 'local';
    }

    registry.register({ flag: MAP }, function map() {
      return new Map([['region', 'local']]);
    });
    registry.register({ flag: DATE }, () => new Date(0));
    registry.register({ flag: INSTANCE }, () => new Settings());
    registry.register({ flag: BARE }, () => {
      const bare: Record<string, unknown> = Object.create(null);
      bare.region = 'local';
      return bare;
    });
    registry.register({ flag: [TRIO_A, TRIO_B], key: ['a', 'b'] }, function trio() {
      return [1, 2, 3];
    });

    expect(() => registry.build(MAP)).toThrowError(/Handler 'map' must return a mapping to merge/);
    expect(() => registry.build(DATE)).toThrowError(InvalidHandlerResultError);
    expect(() => registry.build(INSTANCE)).toThrowError(InvalidHandlerResultError);
    expect(registry.build(BARE)).toEqual({ region: 'local' });
    expect(() => registry.build(TRIO_A)).toThrowError(
      /Handler 'trio' must return an array of 2 values/
    );
  });
});

describe('HandlerRegistry onExecute hook', () => {
  it('reports every handler call in execution order, including failures', () => {
    const FLAGS = defineFlags('A', 'B');
    const timings: Array<[string, number]> = [];
    const registry = new HandlerRegistry(FLAGS, {
      onExecute: (label, durationNs) => timings.push([label, durationNs]),
    });
    registry.register({ flag: FLAGS.flags.B, dependsOn: FLAGS.flags.A }, function fails() {
      throw new Error('nope');
    });
    registry.register({ flag: FLAGS.flags.A, key: 'a' }, function works() {
      return 1;
    });

    expect(() => registry.build(FLAGS.ALL)).toThrowError('nope');
    expect(timings.map(([label]) => label)).toEqual(['works', 'fails']);
    for (const [, durationNs] of timings) {
      expect(Number.isInteger(durationNs)).toBe(true);
      expect(durationNs).toBeGreaterThanOrEqual(0);
    }
  });
});
