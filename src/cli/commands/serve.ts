/**
 * `verdict serve`: expose the debate service over HTTP.
 */

import type { Command } from 'commander'
import type { AddressInfo } from 'node:net'
import { ConfigError } from '../../core/errors.js'
import type { PartialVerdictConfig } from '../../modules/config/config-schema.js'
import { createDebateService } from '../../modules/debate-service/debate-service.js'
import { createHttpServer } from '../../server/http-server.js'
import { createLogger } from '../../utils/logger.js'
import { loadCliConfig, type ConfigDirOptions } from '../utils/load-config.js'

const logger = createLogger('serve-cmd')

export const SERVE_EXIT_INVALID = 2

export interface ServeOptions extends ConfigDirOptions {
  port?: string
  host?: string
  version?: string
}

export interface RunningServer {
  address: AddressInfo
  close(): Promise<void>
}

/** @throws {ConfigError} on a malformed port */
export function buildServeOverrides(opts: ServeOptions): PartialVerdictConfig {
  const server: { port?: number; host?: string } = {}
  if (opts.port !== undefined) {
    const port = Number(opts.port)
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError(`Invalid port "${opts.port}"`)
    }
    server.port = port
  }
  if (opts.host !== undefined) server.host = opts.host
  return Object.keys(server).length === 0 ? {} : { server }
}

export async function startServer(opts: ServeOptions = {}): Promise<RunningServer> {
  const system = await loadCliConfig(opts, buildServeOverrides(opts))
  const config = system.getConfig()

  const service = createDebateService({ config })
  const server = createHttpServer({ service, version: opts.version })
  const address = await server.listen(config.server.port, config.server.host)

  return {
    address,
    close: async () => {
      await server.close()
      service.close()
    },
  }
}

export function registerServeCommand(program: Command, version: string): void {
  program
    .command('serve')
    .description('Start the HTTP API (JSON and server-sent events)')
    .option('--port <port>', 'Port to listen on (0 picks a free port)')
    .option('--host <host>', 'Interface to bind')
    .option('--project-config-dir <dir>', 'Path to project .verdict/ directory')
    .option('--global-config-dir <dir>', 'Path to global .verdict/ directory')
    .action(
      async (opts: { port?: string; host?: string; projectConfigDir?: string; globalConfigDir?: string }) => {
        let running: RunningServer
        try {
          running = await startServer({ ...opts, version })
        } catch (err) {
          if (err instanceof ConfigError) {
            process.stderr.write(`  Configuration error: ${err.message}\n`)
            process.exitCode = SERVE_EXIT_INVALID
            return
          }
          throw err
        }

        const { address, port } = running.address
        process.stdout.write(`Listening on http://${address}:${String(port)}\n`)

        const shutdown = (signal: NodeJS.Signals): void => {
          logger.info({ signal }, 'Shutting down')
          running.close().then(
            () => {
              process.exitCode = 0
            },
            (err: unknown) => {
              logger.error({ err }, 'Error during shutdown')
              process.exitCode = 1
            }
          )
        }
        process.once('SIGINT', shutdown)
        process.once('SIGTERM', shutdown)
      }
    )
}
