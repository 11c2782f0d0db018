import { Bench } from 'tinybench';
import { defineFlags, HandlerRegistry, type BuildResult } from '../src/index.js';

/**
 * Build Performance Benchmark
 *
 * Measures registration, planning and full builds over a small layered flag
 * space, plus a wide space where every flag depends on the one before it.
 */

const FLAGS = defineFlags('BASE', 'LISTENERS', 'RULES', 'TAGS', 'POLICY', 'LIFECYCLE');
const { BASE, LISTENERS, RULES, TAGS, POLICY, LIFECYCLE } = FLAGS.flags;

interface Balancer extends BuildResult {
  listeners?: string[];
}

const createRegistry = () => {
  const registry = new HandlerRegistry(FLAGS, { name: 'Bench' });
  registry.register({ flag: BASE }, (name: string) => ({ name, region: 'local' }));
  registry.register({ flag: LISTENERS, key: 'listeners' }, () => ['http', 'https']);
  registry.register({ flag: RULES, key: 'rules', dependsOn: LISTENERS }, (lb: Balancer) =>
    (lb.listeners ?? []).map((listener) => `${listener}:forward`)
  );
  registry.register({ flag: [TAGS, POLICY], key: ['tags', 'policy'] }, () => [
    { env: 'test' },
    'allow',
  ]);
  registry.register({ flag: LIFECYCLE, key: 'lifecycle', dependsOn: [BASE, TAGS] }, () => 30);
  return registry;
};

const WIDE_NAMES = Array.from({ length: 31 }, (_, i) => `F${i}`);
const WIDE = defineFlags(...WIDE_NAMES);

const createWideRegistry = () => {
  const registry = new HandlerRegistry(WIDE);
  let previous = WIDE.NONE;
  WIDE_NAMES.forEach((name, i) => {
    const flag = WIDE.get(name);
    registry.register({ flag, key: name, dependsOn: previous }, () => i);
    previous = flag;
  });
  return registry;
};

async function runBuildBenchmark() {
  console.log('=== Build Performance Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  const warmRegistry = createRegistry();
  const wideRegistry = createWideRegistry();
  const lastWide = WIDE.get('F30');

  console.log('[phase] warmup complete: registries created\n');

  bench
    // T1: Registration only
    .add('T1: Register (5 bindings)', () => {
      createRegistry();
    })

    // T2: Planning without running handlers
    .add('T2: Plan (ALL)', () => {
      warmRegistry.plan(FLAGS.ALL);
    })

    // T3: Single flag with one dependency
    .add('T3: Build (RULES)', () => {
      warmRegistry.build(RULES);
    })

    // T4: Every flag, structure passed in
    .add('T4: Build (ALL, startWith)', () => {
      warmRegistry.build(FLAGS.ALL, { args: ['lb-1'], startWith: {} });
    })

    // T5: Deep chain, 31 handlers
    .add('T5: Build (31-deep chain)', () => {
      wideRegistry.build(lastWide);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  console.log('\n=== Breakdown ===\n');

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period || 0) * 1_000_000;
  };

  const planTime = getNs('T2: Plan (ALL)');
  const buildTime = getNs('T4: Build (ALL, startWith)');

  console.log(`  Plan (ALL):            ${planTime.toFixed(0)} ns`);
  console.log(`  Build (ALL):           ${buildTime.toFixed(0)} ns`);
  console.log(`  Handler + merge cost:  ${(buildTime - planTime).toFixed(0)} ns`);
  console.log(`  Deep chain build:      ${getNs('T5: Build (31-deep chain)').toFixed(0)} ns`);
}

runBuildBenchmark().catch(console.error);
