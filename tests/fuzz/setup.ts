/**
 * Vitest setup: fast-check global defaults.
 *
 * FUZZ_ITERATIONS sets runs per property (default 50); FUZZ_VERBOSE=true
 * prints counterexample detail.
 */
import * as fc from 'fast-check'

const parsed = parseInt(process.env.FUZZ_ITERATIONS ?? '', 10)
const numRuns = Number.isNaN(parsed) ? 50 : parsed

const verbose = (process.env.FUZZ_VERBOSE ?? 'false') === 'true'

fc.configureGlobal({ numRuns, verbose })

if (verbose) {
  console.log(`fast-check: ${numRuns} runs per property`)
}
