import { z } from 'zod'
import { BasicReading, CardMessage, PremiumReading, SpreadPosition } from './types'

export const SPREAD_POSITIONS: readonly SpreadPosition[] = ['past', 'present', 'future']

const nonEmpty = z.string().trim().min(1)

const orientation = z.preprocess(
  v => (typeof v === 'string' ? v.trim().toLowerCase() : v),
  z.enum(['upright', 'reversed'])
)

export const CardSchema = z.object({
  name: nonEmpty,
  orientation,
  meaning: nonEmpty
})

export const DrinkSchema = z.object({
  name: nonEmpty,
  rationale: nonEmpty
})

export const BasicPayloadSchema = z.object({
  card: CardSchema,
  interpretation: nonEmpty,
  drink: DrinkSchema
})

export const PremiumPayloadSchema = z.object({
  cards: z.array(CardSchema).length(SPREAD_POSITIONS.length),
  interpretation: nonEmpty,
  drinks: z.array(DrinkSchema)
}).superRefine((payload, ctx) => {
  if (payload.drinks.length !== payload.cards.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['drinks'],
      message: `expected ${payload.cards.length} drinks (one per card), got ${payload.drinks.length}`
    })
  }
})

export const MessagePayloadSchema = z.object({
  card: CardSchema,
  message: nonEmpty
})

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string }

function decode<S extends z.ZodTypeAny>(schema: S, raw: string): ParseResult<z.infer<S>> {
  let doc: unknown
  try {
    doc = JSON.parse(raw)
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` }
  }
  const result = schema.safeParse(doc)
  if (!result.success) {
    const error = result.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ')
    return { ok: false, error }
  }
  return { ok: true, value: result.data }
}

export function parseBasicReading(raw: string): ParseResult<BasicReading> {
  const parsed = decode(BasicPayloadSchema, raw)
  if (!parsed.ok) return parsed
  const { card, drink, interpretation } = parsed.value
  return { ok: true, value: { kind: 'basic', card, drink, interpretation } }
}

export function parsePremiumReading(raw: string, context: string): ParseResult<PremiumReading> {
  const parsed = decode(PremiumPayloadSchema, raw)
  if (!parsed.ok) return parsed
  const { cards, drinks, interpretation } = parsed.value
  return {
    ok: true,
    value: {
      kind: 'premium',
      context,
      cards: cards.map((card, i) => ({ ...card, position: SPREAD_POSITIONS[i] })),
      interpretation,
      drinks
    }
  }
}

export function parseCardMessage(raw: string): ParseResult<CardMessage> {
  const parsed = decode(MessagePayloadSchema, raw)
  if (!parsed.ok) return parsed
  return { ok: true, value: { kind: 'message', card: parsed.value.card, message: parsed.value.message } }
}
