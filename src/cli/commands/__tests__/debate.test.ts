/**
 * Tests for `verdict debate`.
 *
 * Covers:
 *  - buildCliOverrides flag translation and rejection of unknown names
 *  - Human and NDJSON output for a completed debate
 *  - Streaming output
 *  - Exit codes for invalid queries, missing API keys, failed debates, failed audits and unexpected errors
 */

import { describe, it, expect } from 'vitest'
import { join } from 'path'
import { tmpdir } from 'os'
import {
  DEBATE_EXIT_AUDIT_FAILED,
  DEBATE_EXIT_ERROR,
  DEBATE_EXIT_FAILED,
  DEBATE_EXIT_INVALID,
  DEBATE_EXIT_SUCCESS,
  buildCliOverrides,
  runDebateAction,
  type DebateCommandOptions,
} from '../debate.js'
import { ConfigError } from '../../../core/errors.js'
import type { VerdictConfig } from '../../../modules/config/config-schema.js'
import { DebateService, type DebateServiceOptions } from '../../../modules/debate-service/debate-service.js'
import type { LedgerBackend, LedgerReceipt } from '../../../modules/audit/types.js'
import { createRoster } from '../../../modules/agents/agent-factory.js'
import type { ParticipantRoster } from '../../../modules/agents/types.js'
import { DEFAULT_CONFIG } from '../../../modules/config/defaults.js'
import type { DebateTopology } from '../../../modules/debate/topology.js'
import { adversarialEchoes, fixedClock } from '../../../../test/helpers/agent-doubles.js'

const EU_QUERY = ['Should', 'we', 'launch', 'our', 'analytics', 'product', 'in', 'the', 'EU?']

// Directories that do not exist: only defaults, env and flags apply
const missingDir = join(tmpdir(), `verdict-cli-missing-${Math.random().toString(36).slice(2)}`)
const DIRS: DebateCommandOptions = {
  projectConfigDir: join(missingDir, 'project'),
  globalConfigDir: join(missingDir, 'global'),
}

const MISSING_KEY_MESSAGE = 'agents.backend is "llm" but no API key was found in $VERDICT_TEST_UNSET_KEY'

function llmRosterWithoutKey(topology: DebateTopology): ParticipantRoster {
  return createRoster(
    topology.participants.map((seat) => seat.id),
    {
      agents: { ...DEFAULT_CONFIG.agents, backend: 'llm', api_key: undefined, api_key_env: 'VERDICT_TEST_UNSET_KEY' },
      decision: DEFAULT_CONFIG.decision,
    }
  )
}

interface Captured {
  out: string[]
  err: string[]
  exitCode: number
}

async function run(
  queryParts: string[],
  opts: DebateCommandOptions = {},
  serviceOptions: Partial<DebateServiceOptions> = {}
): Promise<Captured> {
  const out: string[] = []
  const err: string[] = []
  const exitCode = await runDebateAction(
    queryParts,
    { ...DIRS, pacing: false, ...opts },
    {
      createService: (config: VerdictConfig) =>
        new DebateService({ config, clock: fixedClock('2026-03-03T03:03:03.000Z'), ...serviceOptions }),
      stdout: (line) => out.push(line),
      stderr: (line) => err.push(line),
    }
  )
  return { out, err, exitCode }
}

// ---------------------------------------------------------------------------
// buildCliOverrides
// ---------------------------------------------------------------------------

describe('buildCliOverrides', () => {
  it('returns an empty layer when no flags are given', () => {
    expect(buildCliOverrides({})).toEqual({})
  })

  it('maps every flag to its config path', () => {
    expect(buildCliOverrides({ topology: 'council', backend: 'llm', pacing: false, audit: false })).toEqual({
      debate: { topology: 'council' },
      agents: { backend: 'llm' },
      pacing: { enabled: false },
      audit: { enabled: false },
    })
  })

  it('leaves pacing and audit alone when the flags are true', () => {
    expect(buildCliOverrides({ pacing: true, audit: true })).toEqual({})
  })

  it('rejects an unknown topology', () => {
    expect(() => buildCliOverrides({ topology: 'panel' })).toThrow(
      new ConfigError('Unknown topology "panel" (expected adversarial or council)')
    )
  })

  it('rejects an unknown backend', () => {
    expect(() => buildCliOverrides({ backend: 'gpt' })).toThrow(
      'Unknown backend "gpt" (expected scripted or llm)'
    )
  })
})

// ---------------------------------------------------------------------------
// runDebateAction
// ---------------------------------------------------------------------------

describe('runDebateAction', () => {
  it('prints the transcript, decision table and audit receipt', async () => {
    const { out, err, exitCode } = await run(EU_QUERY)

    expect(exitCode).toBe(DEBATE_EXIT_SUCCESS)
    expect(err).toEqual([])
    expect(out).toHaveLength(9)
    expect(out[0]?.startsWith('── Paranoid Lawyer · Opening ──\n🚨 **LEGAL ALERT: BLOCK THIS LAUNCH**')).toBe(true)
    expect(out[1]?.startsWith('── Greedy Finance · Opening ──\n')).toBe(true)
    expect(out[6]?.startsWith('── The Mediator · Synthesis ──\n')).toBe(true)
    expect(out[7]?.split('\n')[0]).toMatch(/^Risk Level \| Confidence \| Approach +\| Cost of Delay/)
    expect(out[8]).toMatch(/^Audit: recorded 0x[0-9a-f]{64}\n {2}transaction 0x[0-9a-f]{40}, block 15234568\n$/)
  })

  it('emits NDJSON bus events followed by the result in json mode', async () => {
    const { out, exitCode } = await run(EU_QUERY, { outputFormat: 'json' })

    expect(exitCode).toBe(DEBATE_EXIT_SUCCESS)
    const events = out.map((line) => {
      const parsed: unknown = JSON.parse(line)
      return parsed
    })
    expect(events[0]).toMatchObject({ event: 'debate:started' })
    expect(events.at(-2)).toMatchObject({ event: 'audit:completed' })
    expect(events.at(-1)).toMatchObject({
      event: 'debate:result',
      data: { synthesis: { riskLevel: 'HIGH', confidence: 45 }, audit: { status: 'completed' } },
    })
    expect(out.every((line) => line.endsWith('\n'))).toBe(true)
  })

  it('streams messages as they are produced', async () => {
    const { out, exitCode } = await run(EU_QUERY, { stream: true })

    expect(exitCode).toBe(DEBATE_EXIT_SUCCESS)
    expect(out[0]).toMatch(/^Session \S+ \(adversarial\)\n\n$/)
    expect(out.filter((line) => line.startsWith('── '))).toHaveLength(7)
    expect(out.at(-2)).toBe('Recording audit...\n')
  })

  it('skips the audit with --no-audit', async () => {
    const { out, exitCode } = await run(EU_QUERY, { audit: false })

    expect(exitCode).toBe(DEBATE_EXIT_SUCCESS)
    expect(out.at(-1)).toBe('Audit: disabled\n')
  })

  it('returns 2 for an empty query', async () => {
    const { err, exitCode } = await run([])

    expect(exitCode).toBe(DEBATE_EXIT_INVALID)
    expect(err).toEqual(['  Invalid query: query must not be empty\n'])
  })

  it('returns 2 for an empty query when streaming', async () => {
    const { err, exitCode } = await run(['  '], { stream: true })

    expect(exitCode).toBe(DEBATE_EXIT_INVALID)
    expect(err).toEqual(['  Error: query must not be empty\n'])
  })

  it('returns 2 for an unknown topology flag', async () => {
    const { err, exitCode } = await run(EU_QUERY, { topology: 'panel' })

    expect(exitCode).toBe(DEBATE_EXIT_INVALID)
    expect(err).toEqual(['  Configuration error: Unknown topology "panel" (expected adversarial or council)\n'])
  })

  it('returns 2 when the llm backend has no API key', async () => {
    const { err, exitCode } = await run(EU_QUERY, {}, { rosterFactory: llmRosterWithoutKey })

    expect(exitCode).toBe(DEBATE_EXIT_INVALID)
    expect(err).toEqual([`  Configuration error: ${MISSING_KEY_MESSAGE}\n`])
  })

  it('returns 2 when the llm backend has no API key while streaming', async () => {
    const { err, exitCode } = await run(EU_QUERY, { stream: true }, { rosterFactory: llmRosterWithoutKey })

    expect(exitCode).toBe(DEBATE_EXIT_INVALID)
    expect(err).toEqual([`  Configuration error: ${MISSING_KEY_MESSAGE}\n`])
  })

  it('returns 3 when a phase fails', async () => {
    const { roster } = adversarialEchoes({ finance: { failures: { opening: [new Error('no answer')] } } })
    const { err, exitCode } = await run(EU_QUERY, {}, { rosterFactory: () => roster })

    expect(exitCode).toBe(DEBATE_EXIT_FAILED)
    expect(err).toHaveLength(1)
    expect(err[0]?.startsWith('  Debate failed in B_OPENING after 1 message(s): ')).toBe(true)
  })

  it('returns 4 when the debate completes but the audit fails', async () => {
    const offlineLedger: LedgerBackend = {
      submit: async (): Promise<LedgerReceipt> => {
        throw new Error('ledger offline')
      },
      verify: async (contentHash) => ({ verified: false, contentHash }),
      history: async () => [],
    }
    const { out, exitCode } = await run(EU_QUERY, {}, { ledger: offlineLedger })

    expect(exitCode).toBe(DEBATE_EXIT_AUDIT_FAILED)
    expect(out.at(-1)).toMatch(/^Audit: FAILED \(.*ledger offline.*\)\n$/)
  })

  it('returns 1 for an unexpected error', async () => {
    const { err, exitCode } = await run(
      EU_QUERY,
      {},
      {
        rosterFactory: () => {
          throw new Error('roster exploded')
        },
      }
    )

    expect(exitCode).toBe(DEBATE_EXIT_ERROR)
    expect(err).toEqual(['  Error: roster exploded\n'])
  })
})
