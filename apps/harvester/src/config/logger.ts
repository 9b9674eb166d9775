import { createLogger } from '@shelfcrawl/logger'

export const logger = createLogger('harvester')

export const loggers = {
  pipeline: logger.child('pipeline'),
  tasks: logger.child('tasks'),
  cache: logger.child('cache'),
  rateLimit: logger.child('rate-limit'),
  browser: logger.child('browser'),
  extract: logger.child('extract'),
  sink: logger.child('sink'),
  cli: logger.child('cli'),
}
