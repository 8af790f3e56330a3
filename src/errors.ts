/**
 * Erros de domínio. Cada um carrega um `code` estável usado nas respostas JSON.
 */

export type FailureReason =
  | 'network'
  | 'timeout'
  | 'rate_limit'
  | 'schema_violation'
  | 'provider_rejected'
  | 'cancelled'

const TRANSPORT_REASONS: ReadonlySet<FailureReason> = new Set(['network', 'timeout', 'rate_limit'])

export function isTransportReason(reason: FailureReason): boolean {
  return TRANSPORT_REASONS.has(reason)
}

/** Thrown by ReadingGenerator once it stops trying. Never carries a partial reading. */
export class GenerationFailure extends Error {
  readonly code = 'generation_failed'

  constructor(
    public readonly reason: FailureReason,
    public readonly attempts: number,
    public readonly lastPayload: string | null,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? `generation failed after ${attempts} attempt(s): ${reason}`, options)
    this.name = 'GenerationFailure'
  }
}

export class StorageCorruption extends Error {
  readonly code = 'storage_corruption'

  constructor(public readonly file: string, detail: string, options?: { cause?: unknown }) {
    super(`usage ledger file ${file} is unreadable: ${detail}`, options)
    this.name = 'StorageCorruption'
  }
}

export class ConfigError extends Error {
  readonly code = 'config_invalid'

  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}
