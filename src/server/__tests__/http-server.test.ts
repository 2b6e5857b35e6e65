/**
 * HTTP transport tests against an ephemeral loopback port.
 *
 * Covers:
 *  - Health, debate run, sessions, audit, report, verify and ledger routes
 *  - Server-sent event stream framing and order
 *  - Error mapping: 400 for bad input, 404 for unknown resources, 502 for failed debates
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { DebateHttpServer, formatSseEvent } from '../http-server.js'
import { BadRequestError, toErrorResponse } from '../http-errors.js'
import { DebateService } from '../../modules/debate-service/debate-service.js'
import type { ParticipantRoster } from '../../modules/agents/types.js'
import { SessionNotFoundError } from '../../core/errors.js'
import { adversarialEchoes, fixedClock, testConfig } from '../../../test/helpers/agent-doubles.js'

const EU_QUERY = 'Should we launch our analytics product in the EU next month?'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

async function json(response: Response): Promise<Record<string, unknown>> {
  const body: unknown = await response.json()
  if (!isRecord(body)) throw new Error('expected a JSON object')
  return body
}

function parseSse(text: string): Record<string, unknown>[] {
  return text
    .split('\n\n')
    .filter((frame) => frame.startsWith('data: '))
    .map((frame) => {
      const event: unknown = JSON.parse(frame.slice('data: '.length))
      if (!isRecord(event)) throw new Error('expected an event object')
      return event
    })
}

describe('DebateHttpServer', () => {
  let service: DebateService
  let server: DebateHttpServer
  let baseUrl: string

  async function start(roster?: ParticipantRoster): Promise<void> {
    service = new DebateService({
      config: testConfig(),
      clock: fixedClock('2026-05-01T08:00:00.000Z'),
      ...(roster === undefined ? {} : { rosterFactory: () => roster }),
    })
    server = new DebateHttpServer({ service, version: '9.9.9' })
    const address = await server.listen(0, '127.0.0.1')
    baseUrl = `http://127.0.0.1:${String(address.port)}`
  }

  function post(path: string, body: string): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    })
  }

  afterEach(async () => {
    await server.close()
    service.close()
  })

  describe('with scripted agents', () => {
    beforeEach(async () => {
      await start()
    })

    it('reports health', async () => {
      const response = await fetch(`${baseUrl}/health`)
      expect(response.status).toBe(200)
      expect(await json(response)).toEqual({ status: 'ok', version: '9.9.9', sessions: 0 })
    })

    it('runs a debate and returns messages, synthesis with colour and audit', async () => {
      const response = await post('/api/debate', JSON.stringify({ query: EU_QUERY }))
      const body = await json(response)

      expect(response.status).toBe(200)
      expect(body.topology).toBe('adversarial')
      expect(Array.isArray(body.messages) && body.messages.length).toBe(7)
      expect(body.synthesis).toMatchObject({ riskLevel: 'HIGH', confidence: 45, riskColor: '#ef4444' })
      expect(body.audit).toMatchObject({ status: 'completed', receipt: { blockNumber: 15_234_568 } })
    })

    it('serves the session, its audit, report, verification and the ledger', async () => {
      const run = await json(await post('/api/debate', JSON.stringify({ query: EU_QUERY })))
      const sessionId = String(run.sessionId)

      const session = await json(await fetch(`${baseUrl}/api/sessions/${sessionId}`))
      expect(session).toMatchObject({
        sessionId,
        status: 'completed',
        state: 'COMPLETE',
        createdAt: '2026-05-01T08:00:00.000Z',
        synthesis: { riskColor: '#ef4444' },
      })

      const audit = await json(await fetch(`${baseUrl}/api/sessions/${sessionId}/audit`))
      expect(audit).toMatchObject({ sessionId, audit: { status: 'completed' } })

      const report = await fetch(`${baseUrl}/api/sessions/${sessionId}/report`)
      expect(report.headers.get('content-type')).toBe('text/plain; charset=utf-8')
      expect((await report.text()).split('\n')[0]).toBe('DEBATE COMPLIANCE AUDIT REPORT')

      const listed = await json(await fetch(`${baseUrl}/api/sessions`))
      expect(Array.isArray(listed.sessions) && listed.sessions.length).toBe(1)

      const ledger = await json(await fetch(`${baseUrl}/api/ledger`))
      expect(Array.isArray(ledger.entries) && ledger.entries.length).toBe(1)

      const contentHash = service.getAudit(sessionId)?.contentHash ?? ''
      const verified = await json(await fetch(`${baseUrl}/api/verify/${contentHash}`))
      expect(verified.verified).toBe(true)

      const missing = await json(await fetch(`${baseUrl}/api/verify/0x${'0'.repeat(64)}`))
      expect(missing).toEqual({ verified: false, contentHash: `0x${'0'.repeat(64)}` })
    })

    it('streams the debate as server-sent events', async () => {
      const response = await post('/api/debate/stream', JSON.stringify({ query: EU_QUERY, pacing: false }))

      expect(response.status).toBe(200)
      expect(response.headers.get('content-type')).toBe('text/event-stream')
      const events = parseSse(await response.text())
      expect(events.map((e) => e.type)).toEqual([
        'session',
        'message',
        'message',
        'message',
        'message',
        'message',
        'message',
        'message',
        'synthesis',
        'audit_status',
        'audit',
      ])
      expect(events[8]?.synthesis).toMatchObject({ riskLevel: 'HIGH', riskColor: '#ef4444' })
    })

    it('streams an error event for an invalid query', async () => {
      const response = await post('/api/debate/stream', JSON.stringify({ query: '   ' }))

      expect(parseSse(await response.text())).toEqual([
        {
          type: 'error',
          sessionId: null,
          error: { name: 'InvalidQueryError', message: 'query must not be empty', code: 'INVALID_QUERY' },
        },
      ])
    })

    it('rejects malformed bodies with 400', async () => {
      const notJson = await post('/api/debate', '{"query":')
      expect(notJson.status).toBe(400)
      expect(await json(notJson)).toEqual({
        error: { code: 'BAD_REQUEST', message: 'Request body is not valid JSON' },
      })

      const badTopology = await post('/api/debate', JSON.stringify({ query: EU_QUERY, topology: 'panel' }))
      expect(badTopology.status).toBe(400)
      expect(await json(badTopology)).toMatchObject({ error: { code: 'BAD_REQUEST' } })
    })

    it('rejects an empty query with 400', async () => {
      const response = await post('/api/debate', JSON.stringify({ query: '' }))
      expect(response.status).toBe(400)
      expect(await json(response)).toEqual({
        error: { code: 'INVALID_QUERY', message: 'query must not be empty' },
      })
    })

    it('returns 404 for unknown sessions and routes', async () => {
      const session = await fetch(`${baseUrl}/api/sessions/nope`)
      expect(session.status).toBe(404)
      expect(await json(session)).toEqual({
        error: { code: 'SESSION_NOT_FOUND', message: 'Session not found: nope' },
      })

      const route = await fetch(`${baseUrl}/api/unknown`)
      expect(await json(route)).toEqual({ error: { code: 'NOT_FOUND', message: 'GET /api/unknown' } })

      const method = await fetch(`${baseUrl}/api/debate`, { method: 'DELETE' })
      expect(method.status).toBe(404)
    })

    it('returns 404 for a report without a completed audit', async () => {
      const run = await json(await post('/api/debate', JSON.stringify({ query: EU_QUERY, audit: false })))
      const response = await fetch(`${baseUrl}/api/sessions/${String(run.sessionId)}/report`)

      expect(response.status).toBe(404)
      expect(await json(response)).toMatchObject({ error: { code: 'AUDIT_UNAVAILABLE' } })
    })
  })

  describe('with a failing agent', () => {
    beforeEach(async () => {
      const { roster } = adversarialEchoes({ legal: { failures: { rebuttal: [new Error('offline')] } } })
      await start(roster)
    })

    it('returns 502 with the partial transcript', async () => {
      const response = await post('/api/debate', JSON.stringify({ query: EU_QUERY }))
      const body = await json(response)

      expect(response.status).toBe(502)
      expect(body.state).toBe('A_REBUTTAL')
      expect(Array.isArray(body.messages) && body.messages.length).toBe(2)
      expect(body.error).toMatchObject({ code: 'DEBATE_FAILED' })
    })
  })
})

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

describe('formatSseEvent', () => {
  it('frames one JSON event per data line', () => {
    expect(formatSseEvent({ type: 'audit_status', sessionId: 's1', status: 'recording' })).toBe(
      'data: {"type":"audit_status","sessionId":"s1","status":"recording"}\n\n'
    )
  })
})

describe('toErrorResponse', () => {
  it('maps engine errors to statuses', () => {
    expect(toErrorResponse(new BadRequestError('bad')).status).toBe(400)
    expect(toErrorResponse(new SessionNotFoundError('x')).status).toBe(404)
  })

  it('masks key-shaped text in engine error messages', () => {
    const { body } = toErrorResponse(new BadRequestError('rejected key sk-ant-REDACTED'))
    expect(body).toEqual({ error: { code: 'BAD_REQUEST', message: 'rejected key ***' } })
  })

  it('hides the message of unexpected errors', () => {
    expect(toErrorResponse(new Error('secret detail'))).toEqual({
      status: 500,
      body: { error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } },
    })
  })
})
