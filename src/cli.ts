#!/usr/bin/env node
import 'dotenv/config'
import { parseArgs } from 'node:util'
import { loadConfig } from './config.js'
import { createQueryService } from './create-query-service.js'
import { formatResponse } from './format-response.js'
import { configureLogging } from './logging/logger.js'
import { createPinoLogger } from './logging/pino-logger.js'

const USAGE = 'Usage: nl-query "<question>" [--trace]'

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      trace: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  })

  if (values.help) {
    console.log(USAGE)
    return 0
  }

  const question = positionals.join(' ')
  if (question.trim() === '') {
    console.error(USAGE)
    return 2
  }

  const config = loadConfig()
  configureLogging({ logger: createPinoLogger(config.logLevel) })
  const handle = await createQueryService(config)
  try {
    const response = await handle.service.ask(question, { includeTrace: values.trace })
    console.log(formatResponse(response))
    return response.status === 'answered' ? 0 : 1
  } finally {
    await handle.close()
  }
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error))
    process.exitCode = 1
  }
)
