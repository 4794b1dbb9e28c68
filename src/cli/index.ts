import { resolve } from 'node:path'
import { parseArgs } from 'node:util'

import getPort, { portNumbers } from 'get-port'

import { defaultConfig } from '../config.js'
import { buildPaths } from '../fs/paths.js'
import { createHttpServer } from '../http/index.js'
import { closeLogs } from '../log/append.js'
import { bestEffort, setDefaultLogPath } from '../log/safe.js'
import { Orchestrator } from '../orchestrator/orchestrator.js'

import { applyCliEnvOverrides } from './env.js'

import type { FastifyInstance } from 'fastify'

type Role = 'all' | 'api' | 'worker'

const { values } = parseArgs({
  options: {
    port: { type: 'string', short: 'p' },
    'work-dir': { type: 'string', default: '.adlens' },
    role: { type: 'string', default: 'all' },
  },
})

const parseRole = (value: string): Role => {
  if (value === 'all' || value === 'api' || value === 'worker') return value
  console.error(`[cli] invalid role: ${value} (expected all|api|worker)`)
  process.exit(1)
}

const parsePort = (value: string): number => {
  const num = Number(value)
  if (!Number.isInteger(num) || num <= 0 || num > 65535) {
    console.error(`[cli] invalid port: ${value}`)
    process.exit(1)
  }
  return num
}

const role = parseRole(values.role)
const resolvedWorkDir = resolve(values['work-dir'])
setDefaultLogPath(buildPaths(resolvedWorkDir).log)

const config = defaultConfig({ workDir: resolvedWorkDir })
applyCliEnvOverrides(config)
const requestedPort =
  values.port !== undefined ? parsePort(values.port) : config.server.port

if (config.storage.driver === 'memory' && role !== 'all') {
  console.error('[cli] the memory storage driver only supports --role all')
  process.exit(1)
}

console.log('[cli] role:', role, 'workDir:', resolvedWorkDir)

const orchestrator = new Orchestrator(config)
let server: FastifyInstance | null = null

const resolveHttpPort = async (target: number): Promise<number> => {
  const max = Math.min(65535, target + 20)
  const port = await getPort({ port: portNumbers(target, max) })
  if (port !== target)
    console.warn(`[cli] port ${target} is in use, fallback to ${port}`)
  return port
}

const shutdown = async (reason: string, code = 0): Promise<never> => {
  console.log(`\n[cli] ${reason}`)
  const app = server
  server = null
  if (app)
    await bestEffort('cli:close_http', () => app.close(), { meta: { reason } })
  await bestEffort('cli:stop_orchestrator', () => orchestrator.stop(), {
    meta: { reason },
  })
  await bestEffort('cli:close_logs', () => closeLogs())
  process.exit(code)
}

try {
  await orchestrator.init()
  if (role !== 'api') orchestrator.startWorkers()
  if (role !== 'worker') {
    const listenPort = await resolveHttpPort(requestedPort)
    server = await createHttpServer(orchestrator, config, listenPort)
  }
} catch (error) {
  const message = error instanceof Error ? error.message : String(error)
  await shutdown(`startup failed: ${message}`, 1)
}

process.on('SIGINT', () => {
  void shutdown('shutting down...')
})

process.on('SIGTERM', () => {
  void shutdown('received SIGTERM, shutting down...')
})
