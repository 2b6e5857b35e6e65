/**
 * Unit tests for SqliteLedger on an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { SqliteLedger, deriveTransactionId } from '../sqlite-ledger.js'
import { AuditFailedError } from '../../../core/errors.js'
import { fixedClock } from '../../../../test/helpers/agent-doubles.js'

const HASH_A = '0xd7b8cd9c6e14e6def26c1ab7a82e0e8c5f99998461cb5d702d76801be6d4c7cf'
const HASH_B = `0x${'b'.repeat(64)}`

describe('SqliteLedger', () => {
  let ledger: SqliteLedger

  beforeEach(() => {
    ledger = new SqliteLedger({
      genesisBlock: 15_234_567,
      network: 'test-ledger',
      clock: fixedClock('2026-03-01T00:00:00.000Z'),
    })
  })

  afterEach(() => {
    ledger.close()
  })

  it('issues a confirmed receipt at genesis + 1 for the first entry', async () => {
    const receipt = await ledger.submit(HASH_A, { sessionId: 'debate-1' })

    expect(receipt).toEqual({
      transactionId: '0x046a5dbb75809e219d2d0e8b6b7c0315db207590',
      blockNumber: 15_234_568,
      status: 'confirmed',
      contentHash: HASH_A,
      recordedAt: '2026-03-01T00:00:00.000Z',
      network: 'test-ledger',
    })
    expect(deriveTransactionId(HASH_A, 1)).toBe(receipt.transactionId)
  })

  it('returns the original receipt when the same hash is submitted again', async () => {
    const first = await ledger.submit(HASH_A)
    const again = await ledger.submit(HASH_A)

    expect(again).toEqual(first)
    expect(await ledger.history()).toHaveLength(1)
  })

  it('numbers entries consecutively', async () => {
    await ledger.submit(HASH_A)
    const second = await ledger.submit(HASH_B)

    expect(second.blockNumber).toBe(15_234_569)
    expect((await ledger.history()).map((r) => r.contentHash)).toEqual([HASH_A, HASH_B])
  })

  it('verifies recorded hashes and reports unknown ones', async () => {
    const receipt = await ledger.submit(HASH_A)

    expect(await ledger.verify(HASH_A)).toEqual({ verified: true, receipt })
    expect(await ledger.verify(HASH_B)).toEqual({ verified: false, contentHash: HASH_B })
  })

  it('rejects values that are not content hashes', async () => {
    await expect(ledger.submit('0x1234')).rejects.toBeInstanceOf(AuditFailedError)
    await expect(ledger.submit(HASH_A.toUpperCase())).rejects.toThrow('Not a content hash')
  })
})
