import { z } from 'zod'
import { OpenAIConfig, RetryConfig } from './config'
import { FailureReason, GenerationFailure, isTransportReason } from './errors'
import { GenerationMetrics } from './generationMetrics'
import { logger as defaultLogger, Logger } from './logger'
import { PromptTemplates, renderPrompt } from './prompts'
import { ParseResult, parseBasicReading, parseCardMessage, parsePremiumReading } from './schemas'
import { sanitizeForLog } from './security'
import { BasicReading, CardMessage, PremiumReading, ReadingKind } from './types'

export interface GeneratorOptions {
  openai: OpenAIConfig
  retry: RetryConfig
  prompts: PromptTemplates
  metrics?: GenerationMetrics
  logger?: Logger
}

export interface GenerateOptions {
  /** Cancels the whole operation, including any pending backoff. */
  signal?: AbortSignal
  /** Per-attempt timeout; a timed-out attempt still counts against the retry budget. */
  timeoutMs?: number
}

interface ChatMessage {
  role: 'system' | 'user'
  content: string
}

type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: FailureReason; payload: string | null; detail: string; retryAfterMs?: number }

const CompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() })
  })).min(1)
})

const DEFAULT_MESSAGE_CONTEXT = 'the day ahead'

// Status que valem nova tentativa além do 429
const RETRYABLE_STATUS = new Set([408, 409])

/** Delay before the attempt that follows `attempt` (1-based): base doubling each time, capped. */
export function backoffDelay(attempt: number, retry: RetryConfig, retryAfterMs?: number): number {
  const exp = retry.backoffBaseMs * 2 ** Math.max(0, attempt - 1)
  return Math.min(retry.backoffCapMs, Math.max(exp, retryAfterMs ?? 0))
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined
  const secs = Number(header)
  if (Number.isFinite(secs) && secs >= 0) return secs * 1000
  const at = Date.parse(header)
  return Number.isNaN(at) ? undefined : Math.max(0, at - Date.now())
}

function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise(resolve => {
    if (signal?.aborted) return resolve(false)
    const onAbort = () => {
      clearTimeout(timer)
      resolve(false)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Builds chat-completion requests for each reading kind, sends them with bounded
 * retries and validates the JSON the model returns.
 *
 * Holds no per-request state, so concurrent calls are independent. Transport
 * failures and schema violations share one attempt budget; once it runs out the
 * call rejects with {@link GenerationFailure}.
 */
export class ReadingGenerator {
  private readonly openai: OpenAIConfig
  private readonly retry: RetryConfig
  private readonly prompts: PromptTemplates
  private readonly log: Logger
  readonly metrics: GenerationMetrics

  constructor(options: GeneratorOptions) {
    this.openai = options.openai
    this.retry = options.retry
    this.prompts = options.prompts
    this.metrics = options.metrics ?? new GenerationMetrics()
    this.log = options.logger ?? defaultLogger
  }

  generateBasic(options: GenerateOptions = {}): Promise<BasicReading> {
    return this.run('basic', this.buildMessages('basic'), parseBasicReading, options)
  }

  generatePremium(context: string, options: GenerateOptions = {}): Promise<PremiumReading> {
    const trimmed = typeof context === 'string' ? context.trim() : ''
    if (!trimmed) {
      return Promise.reject(new TypeError('invalid_context: premium readings need a non-empty context'))
    }
    return this.run(
      'premium',
      this.buildMessages('premium', { context: trimmed }),
      raw => parsePremiumReading(raw, trimmed),
      options
    )
  }

  generateMessage(context?: string, options: GenerateOptions = {}): Promise<CardMessage> {
    const topic = context?.trim() || DEFAULT_MESSAGE_CONTEXT
    return this.run('message', this.buildMessages('message', { context: topic }), parseCardMessage, options)
  }

  private buildMessages(kind: ReadingKind, vars: Record<string, string> = {}): ChatMessage[] {
    const template = this.prompts[kind]
    return [
      { role: 'system', content: renderPrompt(template.system, vars) },
      { role: 'user', content: renderPrompt(template.user, vars) }
    ]
  }

  private async run<T>(
    kind: ReadingKind,
    messages: ChatMessage[],
    parse: (raw: string) => ParseResult<T>,
    options: GenerateOptions
  ): Promise<T> {
    const { signal } = options
    const timeoutMs = options.timeoutMs ?? this.openai.requestTimeoutMs
    const maxAttempts = this.retry.maxAttempts
    const startedAt = Date.now()
    let lastPayload: string | null = null

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new GenerationFailure('cancelled', attempt - 1, lastPayload)
      }
      const attemptStart = Date.now()
      const outcome = await this.attempt(messages, parse, timeoutMs, signal)
      const elapsed = Date.now() - attemptStart

      if (outcome.ok) {
        this.metrics.recordSuccess(elapsed)
        this.log.info({ kind, attempt, ms: Date.now() - startedAt }, '[ai][reading_generated]')
        return outcome.value
      }

      this.metrics.recordFailure(outcome.reason, elapsed)
      lastPayload = outcome.payload ?? lastPayload
      const retryable = isTransportReason(outcome.reason) || outcome.reason === 'schema_violation'
      this.log.warn({
        kind,
        attempt,
        maxAttempts,
        reason: outcome.reason,
        detail: sanitizeForLog(outcome.detail),
        payload: outcome.payload ? sanitizeForLog(outcome.payload) : undefined
      }, '[ai][attempt_failed]')

      if (!retryable || attempt === maxAttempts) {
        this.log.error({ kind, attempts: attempt, reason: outcome.reason }, '[ai][generation_failed]')
        throw new GenerationFailure(outcome.reason, attempt, lastPayload, `${kind} reading failed after ${attempt} attempt(s): ${outcome.reason} (${outcome.detail})`)
      }

      const delay = backoffDelay(attempt, this.retry, outcome.retryAfterMs)
      if (!(await sleep(delay, signal))) {
        throw new GenerationFailure('cancelled', attempt, lastPayload)
      }
    }
    // maxAttempts >= 1 é garantido pelo config
    throw new GenerationFailure('network', 0, lastPayload, `${kind} reading was never attempted`)
  }

  private async attempt<T>(
    messages: ChatMessage[],
    parse: (raw: string) => ParseResult<T>,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<AttemptOutcome<T>> {
    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onAbort = () => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })

    let status: number
    let body: string
    let retryAfter: string | null
    try {
      const res = await fetch(`${this.openai.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.openai.apiKey}`
        },
        body: JSON.stringify({
          model: this.openai.model,
          messages,
          max_tokens: this.openai.maxTokens,
          temperature: this.openai.temperature,
          response_format: { type: 'json_object' }
        }),
        signal: controller.signal
      })
      status = res.status
      retryAfter = res.headers.get('retry-after')
      body = await res.text()
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err)
      if (signal?.aborted) return { ok: false, reason: 'cancelled', payload: null, detail: 'cancelled by caller' }
      if (timedOut) return { ok: false, reason: 'timeout', payload: null, detail: `no response within ${timeoutMs}ms` }
      return { ok: false, reason: 'network', payload: null, detail }
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }

    if (status === 429) {
      return { ok: false, reason: 'rate_limit', payload: body, detail: 'HTTP 429', retryAfterMs: parseRetryAfter(retryAfter) }
    }
    if (status >= 500 || RETRYABLE_STATUS.has(status)) {
      return { ok: false, reason: 'network', payload: body, detail: `HTTP ${status}` }
    }
    if (status < 200 || status >= 300) {
      return { ok: false, reason: 'provider_rejected', payload: body, detail: `HTTP ${status}` }
    }

    let envelope: unknown
    try {
      envelope = JSON.parse(body)
    } catch {
      return { ok: false, reason: 'schema_violation', payload: body, detail: 'completion envelope is not JSON' }
    }
    const completion = CompletionSchema.safeParse(envelope)
    const content = completion.success ? completion.data.choices[0].message.content?.trim() : undefined
    if (!content) {
      return { ok: false, reason: 'schema_violation', payload: body, detail: 'completion has no message content' }
    }

    const parsed = parse(content)
    if (!parsed.ok) {
      return { ok: false, reason: 'schema_violation', payload: content, detail: parsed.error }
    }
    return { ok: true, value: parsed.value }
  }
}
