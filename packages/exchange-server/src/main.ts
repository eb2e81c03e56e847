/**
 * Boots the exchange server against in-memory collaborators.
 * Contract-account signatures are only honoured when RPC_URL is configured.
 */
import { JsonRpcProvider } from 'ethers'
import { loadConfig, loadEnvFile, CONSTANTS } from './config'
import { createExchangeStack } from './bootstrap'
import { EXCHANGER_ROLE, MANAGER_ROLE } from './collaborators/accessControl'
import { createApp } from './http'
import { getLogger } from './utils/logger'

export function start() {
  const envFile = loadEnvFile()
  const cfg = loadConfig()
  const logger = getLogger()
  logger.level = cfg.LOG_LEVEL

  const reader = cfg.RPC_URL ? new JsonRpcProvider(cfg.RPC_URL, Number(cfg.CHAIN_ID)) : undefined
  const stack = createExchangeStack({
    domain: {
      name: cfg.DOMAIN_NAME,
      version: cfg.DOMAIN_VERSION,
      chainId: cfg.CHAIN_ID,
      verifyingContract: cfg.EXCHANGE_ADDRESS,
    },
    tokens: { utilToken: cfg.UTIL_TOKEN_ADDRESS, govToken: cfg.GOV_TOKEN_ADDRESS },
    initialCap: cfg.INITIAL_VOTING_POWER_CAP,
    reader,
  })
  if (cfg.OPERATOR_ADDRESS) stack.accessControl.grantRole(EXCHANGER_ROLE, cfg.OPERATOR_ADDRESS)
  if (cfg.MANAGER_ADDRESS) stack.accessControl.grantRole(MANAGER_ROLE, cfg.MANAGER_ADDRESS)

  const app = createApp({ engine: stack.engine, capPolicy: stack.capPolicy, auditPath: cfg.REJECTION_AUDIT_PATH })
  const server = app.listen(cfg.PORT, () => {
    logger.info({
      event: 'server.listening',
      app: CONSTANTS.APP_NAME,
      port: cfg.PORT,
      envFile,
      chainId: cfg.CHAIN_ID.toString(),
      verifyingContract: cfg.EXCHANGE_ADDRESS,
      erc1271: Boolean(reader),
    })
  })

  const shutdown = (signal: string) => {
    logger.info({ event: 'server.shutdown', signal })
    server.close(() => {
      reader?.destroy()
      process.exit(0)
    })
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
  return server
}

if (require.main === module) {
  try {
    start()
  } catch (e) {
    getLogger().fatal({ event: 'server.boot_failed', err: e })
    process.exit(1)
  }
}
