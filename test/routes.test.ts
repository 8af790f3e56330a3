import fs from 'fs'
import { Server } from 'http'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ReadingGenerator } from '../src/ai'
import { createApp } from '../src/app'
import { UsageLedger } from '../src/usage'
import {
  basicPayload,
  completion,
  jsonCompletion,
  makeTmpDir,
  premiumPayload,
  stubFetch,
  testOpenAI,
  testPrompts,
  testRetry
} from './helpers'

// o fetch global é substituído pelo mock do provider; o servidor local usa o original
const realFetch = globalThis.fetch

describe('HTTP routes', () => {
  let dir: string
  let server: Server
  let baseUrl: string
  let fetchMock: ReturnType<typeof stubFetch>

  const call = (route: string, init?: { method?: string; body?: unknown; headers?: Record<string, string> }) =>
    realFetch(`${baseUrl}${route}`, {
      method: init?.method ?? (init?.body === undefined ? 'GET' : 'POST'),
      headers: { 'content-type': 'application/json', ...init?.headers },
      body: init?.body === undefined ? undefined : JSON.stringify(init.body)
    })

  beforeEach(async () => {
    dir = await makeTmpDir()
    fetchMock = stubFetch()
    const ledger = await UsageLedger.open({ file: path.join(dir, 'usage.json'), freeLimit: 1, unlimitedUsers: [] })
    const generator = new ReadingGenerator({ openai: testOpenAI, retry: testRetry, prompts: testPrompts })
    const app = createApp({ generator, ledger, internalToken: 'test-secret' })
    server = await new Promise<Server>(resolve => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s))
    })
    const address = server.address()
    if (!address || typeof address === 'string') throw new Error('server did not bind a TCP port')
    baseUrl = `http://127.0.0.1:${address.port}`
  })

  afterEach(async () => {
    vi.unstubAllGlobals()
    // fetch mantém conexões keep-alive abertas; fecha tudo para não travar o close
    server.closeAllConnections()
    await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())))
    await fs.promises.rm(dir, { recursive: true, force: true })
  })

  it('reports health', async () => {
    const res = await call('/health')

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ ok: true })
  })

  it('serves a basic reading and then answers 429 for the same user', async () => {
    fetchMock.mockImplementation(async () => jsonCompletion(basicPayload))
    await call('/users/1001/age-confirmation', { method: 'POST' })

    const first = await call('/readings/basic', { body: { userId: 1001 } })
    expect(first.status).toBe(200)
    expect(await first.json()).toMatchObject({
      ok: true,
      reading: { kind: 'basic', card: { name: 'The Star' } },
      usage: { userId: '1001', count: 1 },
      quota: { ok: false, remaining: 0, limit: 1 }
    })

    const second = await call('/readings/basic', { body: { userId: '1001' } })
    expect(second.status).toBe(429)
    expect(await second.json()).toMatchObject({ error: 'quota_exceeded', usage: { count: 1 } })
  })

  it('maps an exhausted generation to 502 and keeps the quota', async () => {
    fetchMock.mockImplementation(async () => completion('{"card": null}'))
    await call('/users/U1/age-confirmation', { method: 'POST' })

    const res = await call('/readings/basic', { body: { userId: 'U1' } })

    expect(res.status).toBe(502)
    expect(await res.json()).toMatchObject({ error: 'generation_failed', reason: 'schema_violation', attempts: 3 })
    const usage = await call('/usage/U1')
    expect(await usage.json()).toMatchObject({ usage: { count: 0 }, quota: { ok: true, remaining: 1 } })
  })

  it('asks for age confirmation before the first basic reading', async () => {
    const blocked = await call('/readings/basic', { body: { userId: 'U1' } })

    expect(blocked.status).toBe(403)
    expect(await blocked.json()).toMatchObject({ error: 'age_unconfirmed', usage: { userId: 'U1', ageConfirmed: false } })
    expect(fetchMock).not.toHaveBeenCalled()

    const confirmed = await call('/users/U1/age-confirmation', { method: 'POST' })
    expect(confirmed.status).toBe(200)
    expect(await confirmed.json()).toMatchObject({ ok: true, usage: { userId: 'U1', count: 0, ageConfirmed: true } })
  })

  it('rejects malformed user ids', async () => {
    const res = await call('/readings/basic', { body: { userId: '../etc/passwd' } })

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: 'invalid_user', message: 'userId ausente ou inválido' })
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('requires the internal token for premium readings', async () => {
    const res = await call('/readings/premium', { body: { userId: 'U1', context: '1990-05-17' } })

    expect(res.status).toBe(401)
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('serves a premium reading to the payment flow', async () => {
    fetchMock.mockImplementation(async () => jsonCompletion(premiumPayload))

    const res = await call('/readings/premium', {
      body: { userId: 'U1', context: '1990-05-17' },
      headers: { 'x-internal-token': 'test-secret' }
    })

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({
      ok: true,
      reading: { kind: 'premium', context: '1990-05-17', cards: [{ position: 'past' }, { position: 'present' }, { position: 'future' }] },
      usage: { count: 0, premiumCount: 1 }
    })
  })

  it('asks for a context on premium readings', async () => {
    const res = await call('/readings/premium', {
      body: { userId: 'U1', context: '   ' },
      headers: { 'x-internal-token': 'test-secret' }
    })

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: 'missing_context' })
  })

  it('exposes generation metrics', async () => {
    fetchMock.mockImplementation(async () => jsonCompletion({ card: basicPayload.card, message: 'Be patient.' }))
    await call('/readings/message', { body: {} })

    const res = await call('/metrics')

    expect(await res.json()).toMatchObject({
      ok: true,
      generation: { totalRequests: 1, successfulRequests: 1 },
      ledger: { users: 0, freeLimit: 1, pendingWrites: 0 }
    })
  })

  it('answers unknown routes with JSON 404', async () => {
    const res = await call('/nope')

    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'not_found' })
  })
})
