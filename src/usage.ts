import fs from 'fs'
import { z } from 'zod'
import { StorageCorruption } from './errors'
import { logger as defaultLogger, Logger } from './logger'
import { KeyedMutex, Mutex } from './mutex'
import { UsageRecord, UserId } from './types'
import { resolveDataPath, writeFileAtomic } from './utils'

export const LEDGER_VERSION = 1

// Campos desconhecidos (por usuário e no topo do arquivo) passam direto e voltam na próxima escrita
const StoredUsageSchema = z.object({
  count: z.number().int().nonnegative(),
  premiumCount: z.number().int().nonnegative().optional(),
  lastBasicAt: z.string().nullable().optional(),
  lastPremiumAt: z.string().nullable().optional(),
  ageConfirmed: z.boolean().optional()
}).passthrough()

// Os usuários são validados um a um: z.record monta um objeto novo e perderia a chave "__proto__"
const LedgerHeaderSchema = z.object({
  version: z.number().int().positive().optional()
}).passthrough()

type StoredUsage = z.infer<typeof StoredUsageSchema>

interface LedgerState {
  readonly header: Readonly<Record<string, unknown>>
  readonly users: ReadonlyMap<string, Readonly<StoredUsage>>
}

export interface LedgerOptions {
  file: string
  freeLimit: number
  unlimitedUsers?: readonly string[]
  logger?: Logger
  now?: () => Date
}

export interface QuotaStatus {
  ok: boolean
  limit: number
  /** `null` for users on the unlimited allow-list. */
  remaining: number | null
  unlimited: boolean
}

const EMPTY_STATE: LedgerState = { header: { version: LEDGER_VERSION }, users: new Map() }

function userKey(userId: UserId): string {
  const key = String(userId).trim()
  if (!key) throw new TypeError('invalid_user_id: empty user id')
  return key
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function formatIssues(error: z.ZodError, prefix: readonly (string | number)[]): string[] {
  return error.issues.map(i => `${[...prefix, ...i.path].join('.') || '(root)'}: ${i.message}`)
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

export async function readLedgerFile(file: string): Promise<LedgerState> {
  let raw: string
  try {
    raw = await fs.promises.readFile(file, 'utf8')
  } catch (err) {
    if (isMissingFile(err)) return EMPTY_STATE
    throw new StorageCorruption(file, err instanceof Error ? err.message : String(err), { cause: err })
  }

  let doc: unknown
  try {
    doc = JSON.parse(raw)
  } catch (err) {
    throw new StorageCorruption(file, `invalid JSON (${err instanceof Error ? err.message : String(err)})`, { cause: err })
  }
  if (!isRecord(doc)) throw new StorageCorruption(file, '(root): expected object')
  const { users: rawUsers, ...rest } = doc
  if (!isRecord(rawUsers)) throw new StorageCorruption(file, 'users: expected object')

  const issues: string[] = []
  const header = LedgerHeaderSchema.safeParse(rest)
  if (!header.success) issues.push(...formatIssues(header.error, []))
  const users = new Map<string, StoredUsage>()
  for (const [key, value] of Object.entries(rawUsers)) {
    const entry = StoredUsageSchema.safeParse(value)
    if (entry.success) users.set(key, entry.data)
    else issues.push(...formatIssues(entry.error, ['users', key]))
  }
  if (!header.success || issues.length > 0) throw new StorageCorruption(file, issues.join('; '))

  return {
    header: { ...header.data, version: header.data.version ?? LEDGER_VERSION },
    users
  }
}

export function serializeLedger(state: LedgerState): string {
  return JSON.stringify({ ...state.header, users: Object.fromEntries(state.users) }, null, 2) + '\n'
}

/**
 * Per-user free reading counter mirrored to one JSON file.
 *
 * The in-memory snapshot is the source of truth. Every mutation builds a new
 * snapshot from the last committed one, writes it with an atomic rename and only
 * then swaps the reference, so readers never wait on disk I/O and never see a
 * half-applied change. Mutations for one user queue behind each other; the write
 * itself runs under a single process-wide lock.
 */
export class UsageLedger {
  private state: LedgerState
  private readonly userLocks = new KeyedMutex()
  private readonly writeLock = new Mutex()
  private readonly unlimited: ReadonlySet<string>
  private readonly log: Logger
  private readonly now: () => Date
  readonly file: string
  readonly freeLimit: number

  private constructor(options: LedgerOptions, state: LedgerState) {
    this.file = options.file
    this.freeLimit = options.freeLimit
    this.unlimited = new Set((options.unlimitedUsers ?? []).map(userKey))
    this.log = options.logger ?? defaultLogger
    this.now = options.now ?? (() => new Date())
    this.state = state
  }

  /** Loads the ledger file, or starts empty when there is none. Rejects with StorageCorruption on a damaged file. */
  static async open(options: LedgerOptions): Promise<UsageLedger> {
    const file = resolveDataPath(options.file)
    const state = await readLedgerFile(file)
    const ledger = new UsageLedger({ ...options, file }, state)
    ledger.log.info({ file, users: state.users.size, freeLimit: options.freeLimit }, '[usage][ledger_loaded]')
    return ledger
  }

  get size(): number {
    return this.state.users.size
  }

  /** Users with a mutation queued or in flight. */
  get pendingWrites(): number {
    return this.userLocks.pending
  }

  get(userId: UserId): UsageRecord {
    const key = userKey(userId)
    return this.toRecord(key, this.state.users.get(key))
  }

  mayConsume(userId: UserId): boolean {
    const key = userKey(userId)
    if (this.unlimited.has(key)) return true
    return (this.state.users.get(key)?.count ?? 0) < this.freeLimit
  }

  checkQuota(userId: UserId): QuotaStatus {
    const record = this.get(userId)
    if (record.unlimited) {
      return { ok: true, limit: this.freeLimit, remaining: null, unlimited: true }
    }
    const remaining = Math.max(0, this.freeLimit - record.count)
    return { ok: remaining > 0, limit: this.freeLimit, remaining, unlimited: false }
  }

  recordConsumption(userId: UserId): Promise<UsageRecord> {
    return this.mutate(userKey(userId), prev => ({
      ...prev,
      count: prev.count + 1,
      lastBasicAt: this.now().toISOString()
    }))
  }

  recordPremium(userId: UserId): Promise<UsageRecord> {
    return this.mutate(userKey(userId), prev => ({
      ...prev,
      premiumCount: (prev.premiumCount ?? 0) + 1,
      lastPremiumAt: this.now().toISOString()
    }))
  }

  // Idempotente; a confirmação fica gravada no mesmo registro da cota
  confirmAge(userId: UserId): Promise<UsageRecord> {
    return this.mutate(userKey(userId), prev => ({ ...prev, ageConfirmed: true }))
  }

  /** Read-only copy of user → basic reading count. */
  snapshot(): Record<string, number> {
    return Object.fromEntries(Array.from(this.state.users, ([key, stored]) => [key, stored.count]))
  }

  private mutate(key: string, update: (prev: Readonly<StoredUsage>) => StoredUsage): Promise<UsageRecord> {
    return this.userLocks.runExclusive(key, () => this.writeLock.runExclusive(async () => {
      const current = this.state
      const next = update(current.users.get(key) ?? { count: 0 })
      const users = new Map(current.users)
      users.set(key, next)
      const nextState: LedgerState = { header: current.header, users }

      // se a escrita falhar o snapshot em memória fica como estava
      await writeFileAtomic(this.file, serializeLedger(nextState))
      this.state = nextState

      this.log.debug({ userId: key, count: next.count, premiumCount: next.premiumCount ?? 0 }, '[usage][recorded]')
      return this.toRecord(key, next)
    }))
  }

  private toRecord(key: string, stored: Readonly<StoredUsage> | undefined): UsageRecord {
    return {
      userId: key,
      count: stored?.count ?? 0,
      premiumCount: stored?.premiumCount ?? 0,
      unlimited: this.unlimited.has(key),
      lastBasicAt: stored?.lastBasicAt ?? null,
      lastPremiumAt: stored?.lastPremiumAt ?? null,
      ageConfirmed: stored?.ageConfirmed ?? false
    }
  }
}
