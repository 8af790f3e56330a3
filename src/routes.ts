import { Router, Request, Response, NextFunction } from 'express'
import { ReadingGenerator } from './ai'
import { requireInternalToken, requireUserId } from './auth-middleware'
import { GenerationFailure } from './errors'
import { logger } from './logger'
import { drawBasicReading, drawPremiumReading } from './readings'
import { sanitizeContext } from './security'
import { UsageLedger } from './usage'
import { jsonError } from './utils'

export interface RouteDeps {
  generator: ReadingGenerator
  ledger: UsageLedger
  internalToken: string | null
}

// Falha de geração vira 502 com motivo; o transporte mostra "tente mais tarde"
function handleError(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (err instanceof GenerationFailure) {
    logger.error({ path: req.path, reason: err.reason, attempts: err.attempts }, '[routes] generation failed')
    return res.status(502).json({
      ...jsonError('generation_failed', 'Não foi possível gerar a leitura agora. Tente novamente mais tarde.'),
      reason: err.reason,
      attempts: err.attempts
    })
  }
  next(err)
}

// req.userId é preenchido por requireUserId
function userIdOf(req: Request): string {
  return req.userId ?? ''
}

export function createRoutes(deps: RouteDeps): Router {
  const { generator, ledger } = deps
  const r = Router()

  r.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true, uptime: process.uptime() })
  })

  // === Cota / uso ===
  r.get('/usage/:userId', requireUserId, (req: Request, res: Response) => {
    const userId = userIdOf(req)
    res.json({ ok: true, usage: ledger.get(userId), quota: ledger.checkQuota(userId) })
  })

  // Chamada pelo transporte quando o usuário confirma ter idade para bebidas
  r.post('/users/:userId/age-confirmation', requireUserId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const usage = await ledger.confirmAge(userIdOf(req))
      res.json({ ok: true, usage })
    } catch (err) {
      next(err)
    }
  })

  // === Leituras ===
  r.post('/readings/basic', requireUserId, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await drawBasicReading(deps, userIdOf(req))
      if (!result.ok && result.reason === 'age_unconfirmed') {
        return res.status(403).json({
          ...jsonError('age_unconfirmed', 'Confirme sua idade antes da leitura'),
          usage: result.usage
        })
      }
      if (!result.ok) {
        return res.status(429).json({
          ...jsonError('quota_exceeded', 'Leituras grátis esgotadas'),
          usage: result.usage
        })
      }
      res.json({ ok: true, reading: result.reading, usage: result.usage, quota: ledger.checkQuota(userIdOf(req)) })
    } catch (err) {
      handleError(err, req, res, next)
    }
  })

  // Chamada pelo fluxo de pagamento depois da confirmação; não passa pela cota
  r.post('/readings/premium', requireInternalToken(deps.internalToken), requireUserId, async (req: Request, res: Response, next: NextFunction) => {
    const context = sanitizeContext(req.body?.context)
    if (!context) return res.status(400).json(jsonError('missing_context', 'Informe o contexto (ex.: data de nascimento)'))
    try {
      const { reading, usage } = await drawPremiumReading(deps, userIdOf(req), context)
      res.json({ ok: true, reading, usage })
    } catch (err) {
      handleError(err, req, res, next)
    }
  })

  r.post('/readings/message', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const message = await generator.generateMessage(sanitizeContext(req.body?.context) || undefined)
      res.json({ ok: true, reading: message })
    } catch (err) {
      handleError(err, req, res, next)
    }
  })

  // === Métricas ===
  r.get('/metrics', (_req: Request, res: Response) => {
    res.json({ ok: true, generation: generator.metrics.snapshot(), ledger: { users: ledger.size, freeLimit: ledger.freeLimit, pendingWrites: ledger.pendingWrites } })
  })

  return r
}
