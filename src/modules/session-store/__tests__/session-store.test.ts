/**
 * Unit tests for InMemorySessionStore.
 *
 * Covers:
 *  - Save/get/require/list/delete
 *  - TTL expiry on access
 *  - Capacity eviction of the oldest record
 *  - Audit status kept across re-saves
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { InMemorySessionStore, createSessionStore } from '../session-store-impl.js'
import { SessionNotFoundError } from '../../../core/errors.js'
import { createEventBus } from '../../../core/event-bus.js'
import type { DebateEvents } from '../../../core/event-bus.types.js'
import { DebateEngine } from '../../debate/debate-engine.js'
import { ADVERSARIAL_TOPOLOGY } from '../../debate/topology.js'
import type { DebateContext } from '../../debate/types.js'
import { FAST_POLICY, adversarialEchoes } from '../../../../test/helpers/agent-doubles.js'

const engine = new DebateEngine({
  topology: ADVERSARIAL_TOPOLOGY,
  roster: adversarialEchoes().roster,
  policy: FAST_POLICY,
})

function context(sessionId: string): DebateContext {
  return engine.createContext('Should we expand the pilot?', sessionId)
}

describe('InMemorySessionStore', () => {
  let now: number
  let evictions: DebateEvents['session:evicted'][]
  let store: InMemorySessionStore

  beforeEach(() => {
    now = Date.parse('2026-01-01T00:00:00.000Z')
    evictions = []
    const bus = createEventBus()
    bus.on('session:evicted', (payload) => evictions.push(payload))
    store = new InMemorySessionStore({
      ttlMs: 1_000,
      maxEntries: 2,
      clock: () => new Date(now),
      eventBus: bus,
    })
  })

  it('saves and returns records with creation and expiry times', () => {
    const record = store.save(context('s1'))

    expect(record.createdAt).toBe('2026-01-01T00:00:00.000Z')
    expect(record.expiresAt).toBe(now + 1_000)
    expect(record.audit).toBeNull()
    expect(store.get('s1')).toBe(record)
    expect(store.require('s1').context.sessionId).toBe('s1')
  })

  it('returns null for unknown ids and require throws', () => {
    expect(store.get('missing')).toBeNull()
    expect(() => store.require('missing')).toThrow(SessionNotFoundError)
  })

  it('expires records once their TTL has passed', () => {
    store.save(context('s1'))
    now += 999
    expect(store.get('s1')).not.toBeNull()

    now += 1
    expect(store.get('s1')).toBeNull()
    expect(store.size).toBe(0)
    expect(evictions).toEqual([{ sessionId: 's1', reason: 'expired' }])
  })

  it('evicts the oldest record when over capacity', () => {
    store.save(context('s1'))
    store.save(context('s2'))
    store.save(context('s3'))

    expect(store.list().map((r) => r.sessionId)).toEqual(['s2', 's3'])
    expect(evictions).toEqual([{ sessionId: 's1', reason: 'capacity' }])
  })

  it('treats a re-save as most recent and keeps audit and createdAt', () => {
    const ctx = context('s1')
    store.save(ctx)
    store.setAudit('s1', { status: 'recording', contentHash: '0xabc', startedAt: 't' })
    store.save(context('s2'))

    now += 500
    const resaved = store.save(ctx)
    store.save(context('s3'))

    expect(resaved.createdAt).toBe('2026-01-01T00:00:00.000Z')
    expect(resaved.expiresAt).toBe(now + 1_000)
    expect(store.getAudit('s1')).toEqual({ status: 'recording', contentHash: '0xabc', startedAt: 't' })
    expect(store.list().map((r) => r.sessionId)).toEqual(['s1', 's3'])
  })

  it('refuses to set an audit for an unknown session', () => {
    expect(() => {
      store.setAudit('ghost', { status: 'recording', contentHash: '0xabc', startedAt: 't' })
    }).toThrow('Session not found: ghost')
    expect(store.getAudit('ghost')).toBeNull()
  })

  it('deletes and clears records', () => {
    store.save(context('s1'))
    store.save(context('s2'))

    expect(store.delete('s1')).toBe(true)
    expect(store.delete('s1')).toBe(false)
    store.clear()
    expect(store.size).toBe(0)
  })

  it('is created by the factory', () => {
    const created = createSessionStore({ ttlMs: 60_000, maxEntries: 1 })
    created.save(context('s1'))
    expect(created.size).toBe(1)
  })
})
