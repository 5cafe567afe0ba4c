import { createServer } from 'http'
import { ConfigError, ConfigStore, resolveConfigPath } from './services/ConfigStore'
import { SYSTEM_SCOPE, getLogService } from './services/LogService'
import { HostDirectory } from './services/HostDirectory'
import { InterfaceStateStore } from './services/InterfaceStateStore'
import { Broadcaster } from './services/Broadcaster'
import { TrafficMonitor } from './services/TrafficMonitor'
import { registerTrafficSocket, closeTrafficSocket } from './ws/traffic.ws'
import { createStatusHandler } from './http/status.http'

function loadConfig(): ConfigStore {
  const path = resolveConfigPath()
  try {
    return new ConfigStore(path)
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`[Config] ${err.message}`)
      process.exit(1)
    }
    throw err
  }
}

async function main(): Promise<void> {
  const config = loadConfig()
  const settings = config.getAll()

  const log = getLogService()
  log.setMaxEntries(settings.logMaxEntries)
  log.setDebugMode(settings.logDebugMode)

  const hosts = new HostDirectory()
  const warnings = await hosts.load({ ethersFile: settings.ethersFile, leaseCommand: settings.leaseCommand })
  for (const warning of warnings) {
    log.log(SYSTEM_SCOPE, 'warning', 'system', warning)
  }
  log.log(SYSTEM_SCOPE, 'info', 'system', `Loaded ${hosts.size} host label(s)`)

  const store = new InterfaceStateStore(settings.interfaces)
  const broadcaster = new Broadcaster(store, log)
  const monitor = new TrafficMonitor(
    store,
    {
      samplerCommand: settings.samplerCommand,
      samplerArgs: settings.samplerArgs,
      displayLimit: settings.displayLimit,
      requirePrivilege: settings.requirePrivilege,
      requireInterfacePresent: settings.requireInterfacePresent,
      stopTimeoutMs: settings.stopTimeoutMs,
      restart: settings.restart,
      hosts
    },
    log
  )

  const server = createServer(createStatusHandler({ store, broadcaster, monitor, log }))
  const wss = registerTrafficSocket(server, {
    path: settings.websocketPath,
    store,
    broadcaster,
    log,
    queueCapacity: settings.queueCapacity
  })

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(settings.port, settings.host, () => {
      server.off('error', reject)
      resolve()
    })
  })
  log.log(
    SYSTEM_SCOPE,
    'success',
    'server',
    `Listening on http://${settings.host}:${settings.port} (WebSocket ${settings.websocketPath})`
  )

  monitor.start()

  let shuttingDown = false
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return
    shuttingDown = true
    log.log(SYSTEM_SCOPE, 'info', 'system', `Received ${signal}, shutting down`)

    // Stop accepting first, then drain what is connected
    const socketClosed = closeTrafficSocket(wss)
    await broadcaster.closeAll('server shutting down')
    broadcaster.dispose()
    await monitor.stop()
    await socketClosed
    await new Promise<void>((resolve) => server.close(() => resolve()))

    log.log(SYSTEM_SCOPE, 'info', 'system', 'Shutdown complete')
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('[System] Shutdown failed:', err)
          process.exit(1)
        }
      )
    })
  }
}

main().catch((err: unknown) => {
  console.error('[System] Fatal:', err)
  process.exit(1)
})
