export type { SessionStore, SessionRecord } from './session-store.js'
export { InMemorySessionStore, createSessionStore } from './session-store-impl.js'
export type { InMemorySessionStoreOptions } from './session-store-impl.js'
