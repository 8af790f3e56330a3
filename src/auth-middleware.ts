/**
 * Middlewares de autorização para as rotas chamadas pelo transporte de chat e pelo fluxo de pagamento
 */

import crypto from 'crypto'
import { Request, Response, NextFunction } from 'express'
import { logger } from './logger'
import { normalizeUserId, sanitizeForLog } from './security'

// Estender Request para incluir userId
declare global {
  namespace Express {
    interface Request {
      userId?: string
    }
  }
}

function tokensMatch(expected: string, given: string): boolean {
  const a = Buffer.from(expected)
  const b = Buffer.from(given)
  return a.length === b.length && crypto.timingSafeEqual(a, b)
}

// Sem token configurado a rota fica aberta (uso local / atrás de rede privada)
export function requireInternalToken(token: string | null) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!token) return next()
    const given = req.get('x-internal-token') || ''
    if (!tokensMatch(token, given)) {
      logger.warn({ path: sanitizeForLog(req.path), ip: req.ip }, '[auth] token interno inválido')
      return res.status(401).json({ error: 'unauthorized', message: 'Token interno ausente ou inválido' })
    }
    next()
  }
}

// Valida o user id vindo de params ou body e deixa normalizado em req.userId
export function requireUserId(req: Request, res: Response, next: NextFunction) {
  const raw: unknown = req.params.userId ?? req.body?.userId
  const userId = normalizeUserId(raw)
  if (!userId) {
    logger.warn({ userId: sanitizeForLog(raw), path: sanitizeForLog(req.path) }, '[auth] user id inválido')
    return res.status(400).json({ error: 'invalid_user', message: 'userId ausente ou inválido' })
  }
  req.userId = userId
  next()
}
