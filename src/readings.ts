import { GenerateOptions, ReadingGenerator } from './ai'
import { logger } from './logger'
import { UsageLedger } from './usage'
import { BasicReading, PremiumReading, UsageRecord, UserId } from './types'

export interface ReadingDeps {
  generator: Pick<ReadingGenerator, 'generateBasic' | 'generatePremium'>
  ledger: Pick<UsageLedger, 'mayConsume' | 'get' | 'recordConsumption' | 'recordPremium'>
}

export type BasicDrawResult =
  | { ok: true; reading: BasicReading; usage: UsageRecord }
  | { ok: false; reason: 'age_unconfirmed' | 'quota_exceeded'; usage: UsageRecord }

// Ordem fixa: idade confirmada -> checa cota -> gera -> só registra se a geração deu certo.
// Uma falha de geração sobe para o chamador sem consumir a leitura grátis.
export async function drawBasicReading(deps: ReadingDeps, userId: UserId, options?: GenerateOptions): Promise<BasicDrawResult> {
  const { generator, ledger } = deps
  const current = ledger.get(userId)
  if (!current.ageConfirmed) {
    logger.info({ userId: current.userId }, '[readings][age_unconfirmed]')
    return { ok: false, reason: 'age_unconfirmed', usage: current }
  }
  if (!ledger.mayConsume(userId)) {
    logger.info({ userId: String(userId) }, '[readings][quota_exceeded]')
    return { ok: false, reason: 'quota_exceeded', usage: ledger.get(userId) }
  }
  const reading = await generator.generateBasic(options)
  const usage = await ledger.recordConsumption(userId)
  return { ok: true, reading, usage }
}

// Premium é liberado pelo pagamento, não pela cota; só contabilizamos.
// Leitura paga é entregue mesmo se a contagem não puder ser gravada.
export async function drawPremiumReading(
  deps: ReadingDeps,
  userId: UserId,
  context: string,
  options?: GenerateOptions
): Promise<{ reading: PremiumReading; usage: UsageRecord }> {
  const reading = await deps.generator.generatePremium(context, options)
  try {
    const usage = await deps.ledger.recordPremium(userId)
    return { reading, usage }
  } catch (err) {
    logger.error({ userId: String(userId), err }, '[readings][premium_count_failed]')
    return { reading, usage: deps.ledger.get(userId) }
  }
}
