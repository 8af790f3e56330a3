export type Orientation = 'upright' | 'reversed'

export type SpreadPosition = 'past' | 'present' | 'future'

export type ReadingKind = 'basic' | 'premium' | 'message'

export interface Card {
  readonly name: string
  readonly orientation: Orientation
  readonly meaning: string
}

export interface PositionedCard extends Card {
  readonly position: SpreadPosition
}

export interface Drink {
  readonly name: string
  readonly rationale: string
}

export interface BasicReading {
  readonly kind: 'basic'
  readonly card: Card
  readonly drink: Drink
  readonly interpretation: string
}

export interface PremiumReading {
  readonly kind: 'premium'
  readonly context: string
  readonly cards: readonly PositionedCard[]
  readonly interpretation: string
  // um drink por carta, mesma ordem
  readonly drinks: readonly Drink[]
}

export interface CardMessage {
  readonly kind: 'message'
  readonly card: Card
  readonly message: string
}

export type UserId = string | number

export interface UsageRecord {
  userId: string
  count: number
  premiumCount: number
  unlimited: boolean
  lastBasicAt: string | null
  lastPremiumAt: string | null
  ageConfirmed: boolean
}

export type JsonErr = { error: string; message?: string }
