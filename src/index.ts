#!/usr/bin/env node
import { RelayServer } from './relay/server.js'
import { createEventLog } from './log.js'
import { loadConfig, saveConfig, getConfigPath, resolveSettings, validateConfig } from './config.js'

const DEFAULT_LOG_FILE = 'server_log.txt'

const config = loadConfig()
const settings = resolveSettings(config)

function printUsage(): void {
  console.log(`
switchboard - Chat and file relay server

Usage:
  switchboard <command> [options]

Commands:
  start                    Start the relay server
  set-port <port>          Save the default listening port
  set-log-file [path]      Save the event log file (default: server_log.txt, "none" disables)
  config                   Show current configuration
  help                     Show this help message

Environment Variables:
  SWITCHBOARD_PORT      Listening port (default: 5000)
  SWITCHBOARD_HOST      Listening address (default: 0.0.0.0)
  SWITCHBOARD_LOG_FILE  Append the event log to this file
  SWITCHBOARD_HOME      Config directory (default: ~/.switchboard)

Config: ${getConfigPath()}
`)
}

function showConfig(): void {
  console.log('Current configuration:')
  console.log(`  Config file: ${getConfigPath()}`)
  console.log(`  Port: ${config.port ?? '(not set, using env or default)'}`)
  console.log(`  Host: ${config.host ?? '(not set, using env or default)'}`)
  console.log(`  Log file: ${config.logFile ?? '(not set)'}`)
  console.log('')
  console.log('Effective settings:')
  console.log(`  Listen: ${settings.host}:${settings.port}`)
  console.log(`  Log file: ${settings.logFile ?? '(console only)'}`)
  console.log(`  Offer timeout: ${settings.offerTimeoutMs}ms`)
  console.log(`  Transfer idle timeout: ${settings.transferIdleTimeoutMs}ms`)
  console.log(`  Auth timeout: ${settings.authTimeoutMs}ms`)
  console.log(`  Shutdown grace: ${settings.shutdownGraceMs}ms`)
}

function setPort(value: string): void {
  const port = Number(value)
  const errors = validateConfig({ port })
  if (errors.length > 0 || !/^\d+$/.test(value)) {
    console.error(`Error: invalid port "${value}"`)
    process.exit(1)
  }

  if (!saveConfig({ ...config, port })) process.exit(1)
  console.log(`Default port set to: ${port}`)
}

function setLogFile(value: string): void {
  const logFile = value === 'none' ? null : value
  if (!saveConfig({ ...config, logFile })) process.exit(1)
  console.log(logFile ? `Event log file set to: ${logFile}` : 'Event log file disabled')
}

async function startServer(): Promise<void> {
  const log = createEventLog({ logFile: settings.logFile })

  console.log('Starting switchboard...')
  console.log(`  Listen: ${settings.host}:${settings.port}`)
  if (settings.logFile) console.log(`  Log file: ${settings.logFile}`)

  const server = new RelayServer({
    port: settings.port,
    host: settings.host,
    log,
    offerTimeoutMs: settings.offerTimeoutMs,
    transferIdleTimeoutMs: settings.transferIdleTimeoutMs,
    authTimeoutMs: settings.authTimeoutMs,
    shutdownGraceMs: settings.shutdownGraceMs
  })

  try {
    await server.start()
  } catch (err) {
    console.error('Failed to start relay server:', err)
    process.exit(1)
  }

  let isShuttingDown = false

  const shutdown = async (): Promise<void> => {
    if (isShuttingDown) return
    isShuttingDown = true

    console.log('')
    console.log('Shutting down...')

    try {
      await server.stop()
    } catch (err) {
      console.error('  Error stopping relay server:', err)
      process.exit(1)
    }

    console.log('Goodbye!')
    process.exit(0)
  }

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      console.error('Shutdown failed:', err)
      process.exit(1)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  console.log('')
  console.log('Ready. Waiting for connections...')
  console.log('')
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)

  if (args.length === 0) {
    printUsage()
    process.exit(0)
  }

  const command = args[0]

  switch (command) {
    case 'start':
      await startServer()
      break

    case 'set-port':
      if (!args[1]) {
        console.error('Error: port is required')
        console.error('Usage: switchboard set-port <port>')
        process.exit(1)
      }
      setPort(args[1])
      break

    case 'set-log-file':
      setLogFile(args[1] ?? DEFAULT_LOG_FILE)
      break

    case 'config':
      showConfig()
      break

    case 'help':
    case '--help':
    case '-h':
      printUsage()
      break

    default:
      console.error(`Unknown command: ${command}`)
      console.error('Run "switchboard help" for usage.')
      process.exit(1)
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
