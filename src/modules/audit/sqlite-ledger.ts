/**
 * SqliteLedger: simulated ledger on an append-only better-sqlite3 table.
 *
 * Opens `:memory:` by default, so entries live as long as the process.
 * Transaction ids are derived from the content hash and the entry's
 * sequence number; block numbers are the sequence offset by a genesis block.
 */

import { createHash } from 'node:crypto'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import { AuditFailedError } from '../../core/errors.js'
import { systemClock, type Clock } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { CONTENT_HASH_PATTERN } from './payload.js'
import type { LedgerBackend, LedgerMetadata, LedgerReceipt, VerificationResult } from './types.js'

const logger = createLogger('audit:ledger')

const LedgerRowSchema = z.object({
  sequence: z.number().int().positive(),
  content_hash: z.string(),
  transaction_id: z.string(),
  block_number: z.number().int(),
  network: z.string(),
  metadata_json: z.string(),
  recorded_at: z.string(),
})
type LedgerRow = z.infer<typeof LedgerRowSchema>

const NextSequenceSchema = z.object({ next: z.number().int().positive() })

export interface SqliteLedgerOptions {
  /** Offset added to each entry's sequence number */
  genesisBlock: number
  network: string
  /** SQLite database path (default: in-memory) */
  path?: string
  clock?: Clock
}

export function deriveTransactionId(contentHash: string, sequence: number): string {
  return `0x${createHash('sha256').update(`${contentHash}:${String(sequence)}`).digest('hex').slice(0, 40)}`
}

function toReceipt(row: LedgerRow): LedgerReceipt {
  return {
    transactionId: row.transaction_id,
    blockNumber: row.block_number,
    status: 'confirmed',
    contentHash: row.content_hash,
    recordedAt: row.recorded_at,
    network: row.network,
  }
}

export class SqliteLedger implements LedgerBackend {
  private readonly _db: BetterSqlite3Database
  private readonly _genesisBlock: number
  private readonly _network: string
  private readonly _clock: Clock

  constructor(options: SqliteLedgerOptions) {
    this._genesisBlock = options.genesisBlock
    this._network = options.network
    this._clock = options.clock ?? systemClock
    this._db = new BetterSqlite3(options.path ?? ':memory:')
    this._db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_entries (
        sequence       INTEGER PRIMARY KEY,
        content_hash   TEXT NOT NULL UNIQUE,
        transaction_id TEXT NOT NULL,
        block_number   INTEGER NOT NULL,
        network        TEXT NOT NULL,
        metadata_json  TEXT NOT NULL,
        recorded_at    TEXT NOT NULL
      );
    `)
  }

  /**
   * Anchor `contentHash`. Submitting a hash that is already recorded returns
   * the original receipt.
   */
  async submit(contentHash: string, metadata: LedgerMetadata = {}): Promise<LedgerReceipt> {
    if (!CONTENT_HASH_PATTERN.test(contentHash)) {
      throw new AuditFailedError(`Not a content hash: ${contentHash}`, { contentHash })
    }

    const insert = this._db.transaction((): LedgerReceipt => {
      const existing = this._find(contentHash)
      if (existing !== null) return existing

      const { next } = NextSequenceSchema.parse(
        this._db.prepare('SELECT COALESCE(MAX(sequence), 0) + 1 AS next FROM ledger_entries').get()
      )
      const row: LedgerRow = {
        sequence: next,
        content_hash: contentHash,
        transaction_id: deriveTransactionId(contentHash, next),
        block_number: this._genesisBlock + next,
        network: this._network,
        metadata_json: JSON.stringify(metadata),
        recorded_at: this._clock().toISOString(),
      }
      this._db
        .prepare(
          `INSERT INTO ledger_entries
             (sequence, content_hash, transaction_id, block_number, network, metadata_json, recorded_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          row.sequence,
          row.content_hash,
          row.transaction_id,
          row.block_number,
          row.network,
          row.metadata_json,
          row.recorded_at
        )
      return toReceipt(row)
    })

    const receipt = insert()
    logger.debug({ contentHash, transactionId: receipt.transactionId }, 'Ledger entry recorded')
    return receipt
  }

  async verify(contentHash: string): Promise<VerificationResult> {
    const receipt = this._find(contentHash)
    return receipt === null ? { verified: false, contentHash } : { verified: true, receipt }
  }

  async history(): Promise<LedgerReceipt[]> {
    const rows = this._db.prepare('SELECT * FROM ledger_entries ORDER BY sequence ASC').all()
    return rows.map((row) => toReceipt(LedgerRowSchema.parse(row)))
  }

  close(): void {
    if (this._db.open) this._db.close()
  }

  private _find(contentHash: string): LedgerReceipt | null {
    const row: unknown = this._db
      .prepare('SELECT * FROM ledger_entries WHERE content_hash = ?')
      .get(contentHash)
    return row === undefined ? null : toReceipt(LedgerRowSchema.parse(row))
  }
}
