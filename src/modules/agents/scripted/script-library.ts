/**
 * Loader for the scripted persona texts in data/scripted-agents.json.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigError } from '../../../core/errors.js'
import { GENERAL_TOPIC } from '../topic-classifier.js'

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const TopicScriptSchema = z
  .object({
    stance: z.string().min(1),
    opening: z.array(z.string().min(1)).min(1),
    rebuttal: z.array(z.string().min(1)).min(1),
    concession: z.string().min(1),
    final: z.string().min(1),
  })
  .strict()

export type TopicScript = z.infer<typeof TopicScriptSchema>

const PersonaScriptSchema = z
  .object({
    displayName: z.string().min(1),
    role: z.enum(['risk', 'growth']),
    openingHeading: z.string().min(1),
    rebuttalHeading: z.string().min(1),
    finalHeading: z.string().min(1),
    topics: z
      .record(TopicScriptSchema)
      .refine((topics) => GENERAL_TOPIC in topics, { message: `missing "${GENERAL_TOPIC}" topic` }),
  })
  .strict()

export type PersonaScript = z.infer<typeof PersonaScriptSchema>

export const ScriptLibrarySchema = z
  .object({
    version: z.literal(1),
    topics: z.array(z.object({ id: z.string().min(1), keywords: z.array(z.string().min(1)) }).strict()),
    personas: z.record(PersonaScriptSchema),
  })
  .strict()

export type ScriptLibrary = z.infer<typeof ScriptLibrarySchema>

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/** Same relative location from src/ and from dist/ */
const DEFAULT_LIBRARY_URL = new URL('../../../../data/scripted-agents.json', import.meta.url)

let cached: ScriptLibrary | null = null

export function parseScriptLibrary(raw: unknown, source = 'script library'): ScriptLibrary {
  const result = ScriptLibrarySchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  • ${i.path.join('.')}: ${i.message}`).join('\n')
    throw new ConfigError(`Invalid ${source}:\n${issues}`, { source })
  }
  return result.data
}

/**
 * Load and validate a script library. The default file is read once and cached.
 */
export function loadScriptLibrary(path?: string): ScriptLibrary {
  if (path === undefined && cached !== null) return cached

  const filePath = path ?? fileURLToPath(DEFAULT_LIBRARY_URL)
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'))
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Failed to read script library at ${filePath}: ${message}`, { filePath })
  }

  const library = parseScriptLibrary(raw, `script library at ${filePath}`)
  if (path === undefined) cached = library
  return library
}

export function getPersonaScript(library: ScriptLibrary, personaId: string): PersonaScript {
  const persona = library.personas[personaId]
  if (persona === undefined) {
    throw new ConfigError(`Script library has no persona "${personaId}"`, { personaId })
  }
  return persona
}
