import fs from 'fs'
import os from 'os'
import path from 'path'
import { vi } from 'vitest'
import { OpenAIConfig, RetryConfig } from '../src/config'
import { PromptTemplates } from '../src/prompts'

export const testOpenAI: OpenAIConfig = {
  apiKey: 'test-key',
  model: 'test-model',
  baseUrl: 'https://llm.test/v1',
  maxTokens: 500,
  temperature: 0.5,
  requestTimeoutMs: 1000
}

export const testRetry: RetryConfig = { maxAttempts: 3, backoffBaseMs: 1, backoffCapMs: 4 }

export const testPrompts: PromptTemplates = {
  basic: { system: 'basic system', user: 'basic user' },
  premium: { system: 'premium system {"cards": []}', user: 'Spread for {context}' },
  message: { system: 'message system', user: 'Message about {context}' }
}

export const basicPayload = {
  card: { name: 'The Star', orientation: 'upright', meaning: 'hope and renewal' },
  interpretation: 'A calm day with room for new plans.',
  drink: { name: 'Gin fizz', rationale: 'Light and bright like the star.' }
}

export const premiumPayload = {
  cards: [
    { name: 'The Tower', orientation: 'reversed', meaning: 'avoided upheaval' },
    { name: 'Two of Cups', orientation: 'upright', meaning: 'partnership' },
    { name: 'The Sun', orientation: 'upright', meaning: 'success' }
  ],
  interpretation: 'Old storms fade, a bond forms, and the future is bright.',
  drinks: [
    { name: 'Dark and stormy', rationale: 'For the storm that passed.' },
    { name: 'Champagne', rationale: 'Shared with someone close.' },
    { name: 'Aperol spritz', rationale: 'Sunny and golden.' }
  ]
}

/** A fresh chat-completion Response whose message content is `content`. */
export function completion(content: string): Response {
  return new Response(JSON.stringify({
    id: 'cmpl-test',
    choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }]
  }), { status: 200, headers: { 'content-type': 'application/json' } })
}

export function jsonCompletion(payload: unknown): Response {
  return completion(JSON.stringify(payload))
}

export function stubFetch() {
  const fetchMock = vi.fn<typeof fetch>()
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

/** Body of the n-th request sent through the mock, parsed back from JSON. */
export function sentBody(fetchMock: ReturnType<typeof stubFetch>, n = 0): unknown {
  const init = fetchMock.mock.calls[n]?.[1]
  return JSON.parse(String(init?.body))
}

export function makeTmpDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), 'tarot-ledger-'))
}
