import fs from 'fs'
import path from 'path'
import YAML from 'yaml'
import { z } from 'zod'
import { ConfigError } from './errors'

export interface OpenAIConfig {
  readonly apiKey: string
  readonly model: string
  readonly baseUrl: string
  readonly maxTokens: number
  readonly temperature: number
  readonly requestTimeoutMs: number
}

export interface RetryConfig {
  readonly maxAttempts: number
  readonly backoffBaseMs: number
  readonly backoffCapMs: number
}

export interface UsageConfig {
  readonly freeLimit: number
  readonly unlimitedUsers: readonly string[]
  readonly file: string
}

export interface ServerConfig {
  readonly port: number
  readonly internalToken: string | null
}

export interface AppConfig {
  readonly openai: OpenAIConfig
  readonly retry: RetryConfig
  readonly usage: UsageConfig
  readonly server: ServerConfig
}

export const DEFAULT_CONFIG_FILE = path.join(process.cwd(), 'config', 'bot.yaml')

// ${ENV} vazio vira null no YAML; tratamos ambos como "não informado"
const blank = (v: unknown) => (v === null || v === '' ? undefined : v)

const int = (def: number, min: number) => z.preprocess(blank, z.coerce.number().int().min(min).default(def))

const text = (def: string) => z.preprocess(blank, z.coerce.string().trim().default(def))

// Aceita lista YAML, string "1,2,3" ou um id numérico solto
const idList = z.preprocess((v) => {
  if (v === null || v === undefined || v === '') return []
  if (typeof v === 'string') return v.split(',').map(s => s.trim()).filter(Boolean)
  if (typeof v === 'number') return [String(v)]
  if (Array.isArray(v)) return v.map(item => String(item).trim()).filter(Boolean)
  return v
}, z.array(z.string()))

const ConfigSchema = z.object({
  openai: z.object({
    apiKey: z.preprocess(
      v => (blank(v) === undefined ? undefined : String(v).trim()),
      z.string({ required_error: 'OPENAI_API_KEY is required' }).min(1, 'OPENAI_API_KEY is required')
    ),
    model: text('gpt-4-turbo'),
    baseUrl: text('https://api.openai.com/v1'),
    maxTokens: int(2000, 1),
    temperature: z.preprocess(blank, z.coerce.number().min(0).max(2).default(0.7)),
    requestTimeoutMs: int(30_000, 1)
  }).default({}),
  retry: z.object({
    maxAttempts: int(3, 1),
    backoffBaseMs: int(2000, 0),
    backoffCapMs: int(10_000, 0)
  }).default({}),
  usage: z.object({
    freeLimit: int(3, 0),
    unlimitedUsers: idList,
    file: text(path.join('data', 'usage.json'))
  }).default({}),
  server: z.object({
    port: int(3000, 0),
    internalToken: z.preprocess(blank, z.coerce.string().optional())
  }).default({})
})

/** Validates an already-parsed config document and returns a frozen copy. */
export function parseConfig(doc: unknown): AppConfig {
  const result = ConfigSchema.safeParse(doc ?? {})
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`))
  }
  const { openai, retry, usage, server } = result.data
  if (retry.backoffCapMs < retry.backoffBaseMs) {
    throw new ConfigError(['retry.backoffCapMs: must be >= retry.backoffBaseMs'])
  }
  return Object.freeze({
    openai: Object.freeze({ ...openai, baseUrl: openai.baseUrl.replace(/\/+$/, '') }),
    retry: Object.freeze({ ...retry }),
    usage: Object.freeze({ ...usage, unlimitedUsers: Object.freeze([...new Set(usage.unlimitedUsers)]) }),
    server: Object.freeze({ port: server.port, internalToken: server.internalToken ?? null })
  })
}

export function renderTemplate(raw: string, env: NodeJS.ProcessEnv): string {
  return raw.replace(/\$\{([^}]+)\}/g, (_, key: string) => env[key.trim()] ?? '')
}

/**
 * Reads `config/bot.yaml`, substitutes `${ENV}` placeholders and validates it.
 * Loaded once at startup; nothing re-reads it afterwards.
 */
export function loadConfig(file: string = DEFAULT_CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw = fs.readFileSync(file, 'utf8')
  let doc: unknown
  try {
    doc = YAML.parse(renderTemplate(raw, env))
  } catch (err) {
    throw new ConfigError([`${path.basename(file)}: ${err instanceof Error ? err.message : String(err)}`])
  }
  return parseConfig(doc)
}
