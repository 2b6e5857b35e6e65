export { DebateHttpServer, createHttpServer, formatSseEvent, withRiskColor } from './http-server.js'
export type { DebateHttpServerOptions } from './http-server.js'
export { BadRequestError, toErrorResponse } from './http-errors.js'
export type { ErrorResponse } from './http-errors.js'
