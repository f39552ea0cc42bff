import { describe, it, expect } from 'vitest'

import { loadOracle, runawayOracle, selfLoopOracle, type FixtureName } from '../../test/fixtures'
import { runFrontier } from './frontier-driver'
import { runPath } from './path-driver'

const corpus: readonly { fixture: FixtureName; inputs: readonly string[] }[] = [
  { fixture: 'literal-abc', inputs: ['abc', 'ab', 'abcd', '', 'xyz', 'a', 'bc', 'aabc'] },
  { fixture: 'class-repeat', inputs: ['a', 'aa', 'aaa', 'ab', 'aaaaab', 'bbbb', 'cba', ''] },
  { fixture: 'possessive-plus', inputs: ['L', 'LLLL', '', 'La', 'LLa', 'aL', 'LLLLLLLLLL'] },
  { fixture: 'possessive-then-literal', inputs: ['L', 'LL', 'LLL', 'LLLL', ''] },
  { fixture: 'greedy-then-literal', inputs: ['L', 'LL', 'LLL', 'LLLL', 'LaL', ''] },
  { fixture: 'alternation', inputs: ['ab', 'ac', 'a', 'abc', 'ad', 'ba', ''] },
  { fixture: 'any-but-digits', inputs: ['x', 'ab', 'a1', '1', 'hello world', 'v2', ''] },
]

const cases = corpus.flatMap(({ fixture, inputs }) => inputs.map((input) => ({ fixture, input })))

describe('strategy equivalence', () => {
  it.each(cases)('$fixture on $input', ({ fixture, input }) => {
    const oracle = loadOracle(fixture)
    const breadth = runFrontier(input, oracle, { maxCycles: 1000 })
    const depth = runPath(input, oracle, { maxCycles: 1000 })

    expect(breadth.verdict).not.toBe('exhausted')
    expect(depth.verdict).toBe(breadth.verdict)
  })

  it('agrees on an epsilon self-loop', () => {
    expect(runPath('LL', selfLoopOracle()).verdict).toBe(runFrontier('LL', selfLoopOracle()).verdict)
  })

  it('agrees that a runaway closure exhausts the same budget', () => {
    const breadth = runFrontier('LL', runawayOracle(), { maxCycles: 25 })
    const depth = runPath('LL', runawayOracle(), { maxCycles: 25 })

    expect([breadth.verdict, breadth.queries]).toEqual(['exhausted', 25])
    expect([depth.verdict, depth.queries]).toEqual(['exhausted', 25])
  })
})
