import fs from 'fs'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ReadingGenerator } from '../src/ai'
import { GenerationFailure } from '../src/errors'
import { drawBasicReading, drawPremiumReading } from '../src/readings'
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

describe('reading flow', () => {
  let dir: string
  let ledger: UsageLedger
  let generator: ReadingGenerator
  let fetchMock: ReturnType<typeof stubFetch>

  beforeEach(async () => {
    dir = await makeTmpDir()
    fetchMock = stubFetch()
    ledger = await UsageLedger.open({ file: path.join(dir, 'usage.json'), freeLimit: 1, unlimitedUsers: ['vip'] })
    generator = new ReadingGenerator({ openai: testOpenAI, retry: testRetry, prompts: testPrompts })
    await ledger.confirmAge('U1')
    await ledger.confirmAge('vip')
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    vi.unstubAllGlobals()
    await fs.promises.rm(dir, { recursive: true, force: true })
  })

  it('records the free reading only after it was generated', async () => {
    fetchMock.mockImplementation(async () => jsonCompletion(basicPayload))

    const result = await drawBasicReading({ generator, ledger }, 'U1')

    expect(result.ok).toBe(true)
    expect(result.usage.count).toBe(1)
    expect(ledger.get('U1').count).toBe(1)
  })

  it('refuses a basic reading until the user confirms their age', async () => {
    fetchMock.mockImplementation(async () => jsonCompletion(basicPayload))

    const blocked = await drawBasicReading({ generator, ledger }, 'U2')

    expect(blocked).toEqual({ ok: false, reason: 'age_unconfirmed', usage: expect.objectContaining({ userId: 'U2', ageConfirmed: false, count: 0 }) })
    expect(fetchMock).not.toHaveBeenCalled()

    await ledger.confirmAge('U2')
    const result = await drawBasicReading({ generator, ledger }, 'U2')

    expect(result.ok).toBe(true)
    expect(result.usage).toMatchObject({ count: 1, ageConfirmed: true })
  })

  it('answers quota_exceeded without calling the provider once the limit is used', async () => {
    fetchMock.mockImplementation(async () => jsonCompletion(basicPayload))
    await drawBasicReading({ generator, ledger }, 'U1')
    fetchMock.mockClear()

    const result = await drawBasicReading({ generator, ledger }, 'U1')

    expect(result).toEqual({ ok: false, reason: 'quota_exceeded', usage: expect.objectContaining({ userId: 'U1', count: 1 }) })
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('does not consume the free reading when generation fails', async () => {
    fetchMock.mockImplementation(async () => completion('not json at all'))

    await expect(drawBasicReading({ generator, ledger }, 'U1')).rejects.toBeInstanceOf(GenerationFailure)

    expect(ledger.get('U1').count).toBe(0)
    expect(ledger.mayConsume('U1')).toBe(true)
  })

  it('lets allow-listed users draw past the limit', async () => {
    fetchMock.mockImplementation(async () => jsonCompletion(basicPayload))

    for (let i = 0; i < 3; i++) {
      const result = await drawBasicReading({ generator, ledger }, 'vip')
      expect(result.ok).toBe(true)
    }
    expect(ledger.get('vip').count).toBe(3)
  })

  it('serves premium readings regardless of the free quota', async () => {
    fetchMock.mockImplementation(async () => jsonCompletion(basicPayload))
    await drawBasicReading({ generator, ledger }, 'U1')
    fetchMock.mockImplementation(async () => jsonCompletion(premiumPayload))

    const { reading, usage } = await drawPremiumReading({ generator, ledger }, 'U1', '1990-05-17')

    expect(reading.cards).toHaveLength(3)
    expect(usage).toMatchObject({ count: 1, premiumCount: 1 })
  })

  it('still delivers a paid reading when the premium count cannot be written', async () => {
    fetchMock.mockImplementation(async () => jsonCompletion(premiumPayload))
    vi.spyOn(fs.promises, 'rename').mockRejectedValueOnce(new Error('disk full'))

    const { reading, usage } = await drawPremiumReading({ generator, ledger }, 'U1', '1990-05-17')

    expect(reading.cards.map(c => c.name)).toEqual(['The Tower', 'Two of Cups', 'The Sun'])
    expect(usage).toMatchObject({ userId: 'U1', premiumCount: 0, ageConfirmed: true })
    expect(ledger.get('U1').premiumCount).toBe(0)
  })
})
