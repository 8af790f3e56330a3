import 'dotenv/config'
import { ReadingGenerator } from './ai'
import { createApp } from './app'
import { loadConfig } from './config'
import { StorageCorruption } from './errors'
import { GenerationMetrics } from './generationMetrics'
import { logger } from './logger'
import { loadPrompts } from './prompts'
import { UsageLedger } from './usage'

async function main() {
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled Rejection')
  })
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught Exception')
  })

  const config = loadConfig()
  const prompts = loadPrompts()
  const ledger = await UsageLedger.open({
    file: config.usage.file,
    freeLimit: config.usage.freeLimit,
    unlimitedUsers: config.usage.unlimitedUsers
  })
  const generator = new ReadingGenerator({
    openai: config.openai,
    retry: config.retry,
    prompts,
    metrics: new GenerationMetrics()
  })

  const app = createApp({ generator, ledger, internalToken: config.server.internalToken })
  app.listen(config.server.port, () => {
    logger.info({ model: config.openai.model, freeLimit: config.usage.freeLimit }, `Tarot bot online em http://localhost:${config.server.port}`)
  })
}

if (require.main === module) {
  main().catch((err: unknown) => {
    // arquivo do ledger corrompido: não sobe, para não apagar histórico de uso
    if (err instanceof StorageCorruption) {
      logger.fatal({ file: err.file, err }, '[usage] ledger corrompido, abortando')
    } else {
      logger.fatal({ err }, 'Falha ao iniciar')
    }
    process.exit(1)
  })
}
