/**
 * HTTP transport over node:http.
 *
 *   POST /api/debate                 run to completion, JSON result
 *   POST /api/debate/stream          same debate as server-sent events
 *   GET  /api/sessions               session summaries
 *   GET  /api/sessions/:id           full context of one session
 *   GET  /api/sessions/:id/audit     audit status and receipt
 *   GET  /api/sessions/:id/report    plain-text audit report
 *   GET  /api/verify/:hash           ledger lookup
 *   GET  /api/ledger                 every ledger receipt
 *   GET  /health
 */

import http from 'node:http'
import type { AddressInfo } from 'node:net'
import type pino from 'pino'
import { z } from 'zod'
import { toError } from '../core/errors.js'
import { createLogger } from '../utils/logger.js'
import { TopologySettingSchema } from '../modules/config/config-schema.js'
import type { DebateService } from '../modules/debate-service/debate-service.js'
import type { DebateStreamEvent } from '../modules/debate-service/types.js'
import { NO_PACING } from '../modules/debate/stream-driver.js'
import type { SynthesisResult } from '../modules/decision/types.js'
import { RISK_COLORS } from '../modules/decision/risk-table.js'
import { BadRequestError, toErrorResponse } from './http-errors.js'

const defaultLogger = createLogger('server')

const MAX_BODY_BYTES = 64 * 1024

const DebateBodySchema = z.object({
  query: z.unknown(),
  topology: TopologySettingSchema.optional(),
  audit: z.boolean().optional(),
  /** Streaming only: false turns off cosmetic delays */
  pacing: z.boolean().optional(),
})
type DebateBody = z.infer<typeof DebateBodySchema>

// ---------------------------------------------------------------------------
// Wire helpers
// ---------------------------------------------------------------------------

const readBody = async (req: http.IncomingMessage): Promise<unknown> => {
  const chunks: Buffer[] = []
  let size = 0
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))
    size += buffer.length
    if (size > MAX_BODY_BYTES) {
      throw new BadRequestError(`Request body exceeds ${String(MAX_BODY_BYTES)} bytes`)
    }
    chunks.push(buffer)
  }
  const raw = Buffer.concat(chunks).toString('utf8').trim()
  if (!raw) {
    return {}
  }
  try {
    const parsed: unknown = JSON.parse(raw)
    return parsed
  } catch {
    throw new BadRequestError('Request body is not valid JSON')
  }
}

const respondJson = (res: http.ServerResponse, status: number, payload: unknown): void => {
  res.writeHead(status, { 'Content-Type': 'application/json' })
  res.end(JSON.stringify(payload))
}

async function parseDebateBody(req: http.IncomingMessage): Promise<DebateBody> {
  const result = DebateBodySchema.safeParse(await readBody(req))
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new BadRequestError(
      issue === undefined ? 'Invalid request body' : `${issue.path.join('.')}: ${issue.message}`
    )
  }
  return result.data
}

export function withRiskColor(synthesis: SynthesisResult): SynthesisResult & { riskColor: string } {
  return { ...synthesis, riskColor: RISK_COLORS[synthesis.riskLevel] }
}

/** SSE frame for one stream event; synthesis events gain the display colour */
export function formatSseEvent(event: DebateStreamEvent): string {
  const wire = event.type === 'synthesis' ? { ...event, synthesis: withRiskColor(event.synthesis) } : event
  return `data: ${JSON.stringify(wire)}\n\n`
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

export interface DebateHttpServerOptions {
  service: DebateService
  version?: string
  logger?: pino.Logger
}

export class DebateHttpServer {
  private readonly _service: DebateService
  private readonly _version: string
  private readonly _logger: pino.Logger
  private _server: http.Server | null = null

  constructor(options: DebateHttpServerOptions) {
    this._service = options.service
    this._version = options.version ?? '0.0.0'
    this._logger = options.logger ?? defaultLogger
  }

  /** Start listening; port 0 picks a free port */
  listen(port: number, host: string): Promise<AddressInfo> {
    const server = http.createServer((req, res) => {
      void this._handle(req, res)
    })
    this._server = server

    return new Promise((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        const address = server.address()
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'))
          return
        }
        this._logger.info({ host: address.address, port: address.port }, 'HTTP server listening')
        resolve(address)
      })
    })
  }

  async close(): Promise<void> {
    const server = this._server
    if (server === null) return
    this._server = null
    server.closeAllConnections()
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error)
          return
        }
        resolve()
      })
    })
    this._logger.info('HTTP server closed')
  }

  private async _handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? 'GET'
    const { pathname } = new URL(req.url ?? '/', 'http://localhost')
    this._logger.debug({ method, path: pathname }, 'Request')

    try {
      if (method === 'POST' && pathname === '/api/debate') {
        await this._runDebate(req, res)
        return
      }
      if (method === 'POST' && pathname === '/api/debate/stream') {
        await this._streamDebate(req, res)
        return
      }
      if (method === 'GET') {
        await this._handleGet(pathname, res)
        return
      }
      respondJson(res, 404, { error: { code: 'NOT_FOUND', message: `${method} ${pathname}` } })
    } catch (error) {
      const { status, body } = toErrorResponse(error)
      if (status >= 500) {
        this._logger.error({ method, path: pathname, err: toError(error).message }, 'Request failed')
      }
      if (res.headersSent) {
        res.end()
        return
      }
      respondJson(res, status, body)
    }
  }

  private async _handleGet(pathname: string, res: http.ServerResponse): Promise<void> {
    if (pathname === '/health') {
      respondJson(res, 200, { status: 'ok', version: this._version, sessions: this._service.store.size })
      return
    }
    if (pathname === '/api/sessions') {
      respondJson(res, 200, { sessions: this._service.listSessions() })
      return
    }
    if (pathname === '/api/ledger') {
      respondJson(res, 200, { entries: await this._service.ledgerHistory() })
      return
    }

    const verify = /^\/api\/verify\/([^/]+)$/.exec(pathname)
    if (verify?.[1] !== undefined) {
      respondJson(res, 200, await this._service.verify(decodeURIComponent(verify[1])))
      return
    }

    const session = /^\/api\/sessions\/([^/]+)(?:\/(audit|report))?$/.exec(pathname)
    if (session?.[1] !== undefined) {
      const sessionId = decodeURIComponent(session[1])
      if (session[2] === 'audit') {
        respondJson(res, 200, { sessionId, audit: this._service.getAudit(sessionId) })
        return
      }
      if (session[2] === 'report') {
        const report = this._service.getAuditReport(sessionId)
        res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' })
        res.end(report)
        return
      }
      const record = this._service.getSession(sessionId)
      const { context } = record
      respondJson(res, 200, {
        ...context,
        synthesis: context.synthesis === null ? null : withRiskColor(context.synthesis),
        audit: record.audit,
        createdAt: record.createdAt,
      })
      return
    }

    respondJson(res, 404, { error: { code: 'NOT_FOUND', message: `GET ${pathname}` } })
  }

  private async _runDebate(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const body = await parseDebateBody(req)
    const outcome = await this._service.runDebate({
      query: body.query,
      topology: body.topology,
      audit: body.audit,
    })
    respondJson(res, 200, {
      sessionId: outcome.sessionId,
      topology: outcome.context.topology,
      messages: outcome.messages,
      synthesis: withRiskColor(outcome.synthesis),
      audit: outcome.audit,
    })
  }

  private async _streamDebate(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const body = await parseDebateBody(req)
    const controller = new AbortController()
    res.on('close', () => {
      if (!res.writableFinished) controller.abort(new Error('Client disconnected'))
    })

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    })

    const events = this._service.streamDebate({
      query: body.query,
      topology: body.topology,
      audit: body.audit,
      signal: controller.signal,
      ...(body.pacing === false ? { pacing: NO_PACING } : {}),
    })
    for await (const event of events) {
      if (controller.signal.aborted) break
      res.write(formatSseEvent(event))
    }
    res.end()
  }
}

export function createHttpServer(options: DebateHttpServerOptions): DebateHttpServer {
  return new DebateHttpServer(options)
}
