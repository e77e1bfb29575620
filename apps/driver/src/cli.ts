#!/usr/bin/env node
import { resolve } from 'node:path'
import { type RunState, camelToSnakeDeep, formatDuration } from '@zonekit/core'
import { program } from 'commander'
import pino from 'pino'
import {
  type Logger,
  type ResolvedDriverConfig,
  StateStore,
  captureResolutionContext,
  createCredentials,
  createLogger,
  createZoneDriver,
  getEnvString,
  holdsRemoteResources,
  isDriverError,
  loadConfigFile,
  resolveDriverConfig,
} from './index'

interface GlobalOptions {
  config: string
  stateDir: string
  logLevel: string
  host?: string
}

program
  .name('zonekit')
  .description('Provision throwaway zones on a global zone host for test runs')
  .version('0.1.0')
  .option('-c, --config <file>', 'Configuration file', getEnvString('ZONEKIT_CONFIG', '.zonekit.yml'))
  .option('--state-dir <dir>', 'Directory for run state files', getEnvString('ZONEKIT_STATE_DIR', '.zonekit'))
  .option('--log-level <level>', 'Log level', getEnvString('ZONEKIT_LOG_LEVEL', 'info'))
  .option('-H, --host <host>', 'Global zone host (overrides global_zone_host)')

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>()
}

// Log lines go to stderr; stdout carries JSON results only
function cliLogger(): Logger {
  return createLogger(globals().logLevel, pino.destination(2))
}

function stateStore(logger: Logger): StateStore {
  return new StateStore({ dir: resolve(globals().stateDir), logger })
}

function loadConfig(instance: string, overrides: Record<string, unknown> = {}): ResolvedDriverConfig {
  const { config, host } = globals()
  const merged = host === undefined ? overrides : { global_zone_host: host, ...overrides }
  return resolveDriverConfig(loadConfigFile(resolve(config), merged), captureResolutionContext(instance))
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2))
}

function fail(logger: Logger, error: unknown, fallback: string): never {
  logger.debug({ err: error }, fallback)
  if (isDriverError(error)) {
    console.error(`[${error.code}] ${error.message}`)
  } else {
    console.error(error instanceof Error ? error.message : fallback)
  }
  process.exit(1)
}

// ─────────────────────────────────────────────────────────────────────────────
// Zone Commands
// ─────────────────────────────────────────────────────────────────────────────

program
  .command('create <instance>')
  .description('Create a zone and print its connection details')
  .option('-t, --timeout <duration>', 'Deadline for the whole create (e.g. 15m)')
  .option('--keep-config', 'Keep staged artifacts for inspection')
  .action(async (instance: string, options: { timeout?: string; keepConfig?: boolean }) => {
    const logger = cliLogger()
    try {
      const overrides: Record<string, unknown> = {}
      if (options.timeout !== undefined) overrides.create_timeout = options.timeout
      if (options.keepConfig) overrides.keep_config = true
      const config = loadConfig(instance, overrides)

      const store = stateStore(logger)
      const state = await store.load(instance)
      if (holdsRemoteResources(state)) {
        if (state.phase !== 'NetworkReady') {
          throw new Error(
            `Instance ${instance} has a partially created zone (${state.zoneName ?? 'unnamed'}); run destroy first`,
          )
        }
        logger.info({ instance, zoneName: state.zoneName }, 'Zone already exists')
        printJson(endpointJson(state))
        return
      }

      const driver = await createZoneDriver(config, { logger })
      const controller = new AbortController()
      const onSigint = () => controller.abort(new Error('Interrupted'))
      process.once('SIGINT', onSigint)
      const timeoutMs = config.createTimeout
      const timer =
        timeoutMs === undefined
          ? undefined
          : setTimeout(
              () => controller.abort(new Error(`Create timed out after ${formatDuration(timeoutMs)}`)),
              timeoutMs,
            )

      try {
        await driver.lifecycle.create(state, { signal: controller.signal })
        printJson(endpointJson(state))
      } finally {
        clearTimeout(timer)
        process.off('SIGINT', onSigint)
        await store.save(instance, state)
        await driver.close()
      }
    } catch (e) {
      fail(logger, e, 'Create failed')
    }
  })

program
  .command('destroy <instance>')
  .description('Remove the zone and forwarding rule recorded for an instance')
  .action(async (instance: string) => {
    const logger = cliLogger()
    try {
      const config = loadConfig(instance)
      const store = stateStore(logger)
      const state = await store.load(instance)

      const driver = await createZoneDriver(config, { logger })
      try {
        const report = await driver.lifecycle.destroy(state)
        printJson(camelToSnakeDeep(report))
      } finally {
        await store.save(instance, state)
        await driver.close()
      }
    } catch (e) {
      fail(logger, e, 'Destroy failed')
    }
  })

program
  .command('keygen')
  .description('Create the zone login key pair if missing and print the public key')
  .action(async () => {
    const logger = cliLogger()
    try {
      const config = loadConfig('keygen')
      const credentials = createCredentials(config, logger)
      await credentials.ensure()
      console.log(await credentials.readPublicKey())
    } catch (e) {
      fail(logger, e, 'Key generation failed')
    }
  })

program
  .command('show <instance>')
  .description('Print the stored run state of an instance')
  .action(async (instance: string) => {
    const logger = cliLogger()
    try {
      const state = await stateStore(logger).load(instance)
      printJson(camelToSnakeDeep(state))
    } catch (e) {
      fail(logger, e, 'Show failed')
    }
  })

function endpointJson(state: RunState) {
  return {
    hostname: state.hostname,
    port: state.port,
    username: state.username,
    zone_name: state.zoneName,
  }
}

await program.parseAsync()
