/**
 * Resolution Performance Benchmark
 *
 * Scenarios:
 * 1. Cached slot: repeat resolution of a bound slot
 * 2. Cold walk: reset + full ancestor walk (depth 32)
 * 3. Borrowed: reset + walk stopping at a bound ancestor dependent
 * 4. Fallback: reset + walk miss + registry hit
 * 5. Gate: attach a 4-slot dependent whose providers have published
 * 6. Machine: 100 queued transitions through one drain
 */

import { Bench } from 'tinybench';
import {
  dependent,
  FallbackRegistry,
  LifecycleGate,
  Machine,
  Node,
  provide,
  publish,
  Resolver,
  silentLog,
  token,
} from '../src/index.js';

// ==================== Test Setup ====================

const DEPTH = 32;

const ThemeT = token<{ color: string }>('Theme');
const AudioT = token<string>('Audio');
const InputT = token<number>('Input');
const SaveT = token<boolean>('Save');
const SettingsT = token<{ volume: number }>('Settings');

const root = new Node('root');
provide(root, ThemeT, () => ({ color: 'red' }));
provide(root, AudioT, () => 'bus');
provide(root, InputT, () => 1);
provide(root, SaveT, () => true);
publish(root);

let tip = root;
for (let i = 0; i < DEPTH; i++) tip = tip.addChild(new Node(`level${i}`));
const leaf = tip.addChild(new Node('leaf'));

// A dependent two levels above the leaf that has already bound ThemeT
const midway = leaf.parent?.parent ?? root;

const settings = new Node('settings');
provide(settings, SettingsT, () => ({ volume: 1 }));
const fallback = new FallbackRegistry(silentLog);
fallback.register(settings);

const walking = new Resolver({ fallback, borrow: false });
const borrowing = new Resolver({ fallback });
borrowing.resolve(midway, ThemeT);

const gate = new LifecycleGate(borrowing, { log: silentLog });
dependent(leaf).need(ThemeT).need(AudioT).need(InputT).need(SaveT);

// ==================== Benchmark ====================

const bench = new Bench({
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('cached slot', () => {
  if (walking.resolve(leaf, AudioT) !== root) throw new Error('Invalid');
});

bench.add(`cold walk (depth ${DEPTH})`, () => {
  dependent(leaf).reset();
  if (walking.resolve(leaf, ThemeT) !== root) throw new Error('Invalid');
});

bench.add('borrowed from ancestor', () => {
  dependent(leaf).reset();
  if (borrowing.resolve(leaf, ThemeT) !== root) throw new Error('Invalid');
});

bench.add('fallback registry', () => {
  dependent(leaf).reset();
  if (walking.resolve(leaf, SettingsT) !== settings) throw new Error('Invalid');
});

bench.add('gate: attach 4 published slots', () => {
  const attachment = gate.attachAndWait(leaf, () => undefined);
  if (!attachment.isReady) throw new Error('Invalid');
});

bench.add('machine: 100 transitions', () => {
  const machine = new Machine(0, undefined, { log: silentLog });
  machine.onChanged((n) => {
    if (n < 100) machine.update(n + 1);
  });
  machine.update(1);
  if (machine.state !== 100) throw new Error('Invalid');
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log('Resolution Performance Results');
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.period
      ? `${(1000 / task.result.period).toLocaleString('en-US', { maximumFractionDigits: 0 })}`
      : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
    hz: task.result?.hz ? task.result.hz.toFixed(2) : 'N/A',
  }))
);

const cold = bench.tasks.find((t) => t.name.startsWith('cold walk'));
const borrowed = bench.tasks.find((t) => t.name === 'borrowed from ancestor');

if (cold?.result?.period && borrowed?.result?.period) {
  const saved = ((cold.result.period - borrowed.result.period) * 1000000).toFixed(2);
  console.log(`\nBorrowing saves ${saved}ns per resolution at depth ${DEPTH}`);
}
