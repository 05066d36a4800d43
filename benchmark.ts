// npx tsx benchmark.ts
/* eslint no-console: off */
import {Bench} from 'tinybench'

import {OrderedDict} from './src'

declare global {
  namespace NodeJS {
    export interface ProcessEnv {
      /** Number of keys per run */
      BENCH_SIZE?: string
    }
  }
}

const SIZE = parseInt(process.env.BENCH_SIZE || '10000')
if (isNaN(SIZE) || SIZE < 1)
  throw new TypeError('BENCH_SIZE must be a positive integer')

// deterministic shuffle so every run builds the same (roughly balanced) tree
function shuffled(size: number): number[] {
  const keys = Array.from({length: size}, (_, i) => i)
  let seed = 42
  for (let i = keys.length - 1; i > 0; i--) {
    seed = (seed * 1103515245 + 12345) % 2147483648
    const j = seed % (i + 1)
    const tmp = keys[i]
    keys[i] = keys[j]
    keys[j] = tmp
  }
  return keys
}

const KEYS = shuffled(SIZE)
const populated = new OrderedDict<number, number>(KEYS.map((k): [number, number] => [k, k]))
const native = new Map<number, number>(KEYS.map((k): [number, number] => [k, k]))

console.log(`BENCH_SIZE=${SIZE}`)

async function main() {
  const bench = new Bench({time: 500})

  bench
    .add('OrderedDict add (shuffled)', () => {
      const dict = new OrderedDict<number, number>()
      for (const k of KEYS) dict.add(k, k)
    })
    .add('Map set (shuffled)', () => {
      const map = new Map<number, number>()
      for (const k of KEYS) map.set(k, k)
    })
    .add('OrderedDict has', () => {
      for (const k of KEYS) populated.has(k)
    })
    .add('OrderedDict iterate', () => {
      for (const pos = populated.begin(); !pos.done; pos.next()) {
        // walk only
      }
    })
    .add('Map iterate + sort', () => {
      Array.from(native.keys()).sort((a, b) => a - b)
    })
    .add('OrderedDict copy', () => {
      populated.copy()
    })
    .add('OrderedDict add/remove', () => {
      const dict = populated.copy()
      for (const k of KEYS) dict.remove(k)
    })

  await bench.run()

  console.table(bench.table())
}

main().catch(err => {
  console.error(err)
  process.exitCode = 1
})
