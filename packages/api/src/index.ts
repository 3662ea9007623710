import './load-env.js'
import './instrumentation.js'
import { createLogger, Gateway } from '@smsbridge/core'
import { registerProviders } from '@smsbridge/providers'
import { loadEnv } from './config.js'
import { startServer } from './server.js'

const env = loadEnv()

const logger = await createLogger({
  serviceName: 'smsbridge-api',
  level: env.LOG_LEVEL.toLowerCase(),
})

const gateway = new Gateway({ logger })

try {
  registerProviders(
    gateway,
    [
      {
        alias: env.PSWIN_ALIAS,
        type: 'pswin',
        options: {
          user: env.PSWIN_USER,
          password: env.PSWIN_PASSWORD,
          senderId: env.PSWIN_SENDER_ID,
          apiUrl: env.PSWIN_API_URL,
        },
      },
    ],
    logger,
  )
} catch (err) {
  logger.error({ err }, 'Failed to configure providers')
  process.exit(1)
}

gateway.onReceive((message) => {
  logger.info({ provider: message.provider, msgid: message.msgid }, 'Inbound message received')
})

gateway.onStatus((report) => {
  logger.info(
    { provider: report.provider, msgid: report.msgid, status: report.status },
    'Delivery status received',
  )
})

startServer({ gateway, logger }).catch((err: unknown) => {
  logger.error({ err }, 'Failed to start server')
  process.exit(1)
})
