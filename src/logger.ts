import pino from 'pino'

// Em testes fica silencioso, a não ser que LOG_LEVEL seja definido
const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info')

export const logger = pino({
  level,
  base: { service: 'tarot-reading-bot' },
  timestamp: pino.stdTimeFunctions.isoTime
})

export type Logger = typeof logger
