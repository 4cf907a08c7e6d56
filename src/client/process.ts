/**
 * Exporter Process
 *
 * Runs the exporter under test as a child process. The exporter prints a line
 * on stdout once its HTTP server is listening; that line is the readiness
 * signal.
 */

import { spawn, type ChildProcess } from 'node:child_process'
import { createInterface } from 'node:readline'
import { Errors } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('exporter-process')

export interface ExporterOptions {
  exporterPath: string
  definitionsPath: string
  port: number
  smp: number
  /** Give up waiting for readiness after this many milliseconds (default: 30000) */
  startTimeoutMs?: number
}

export interface ExporterHandle {
  readonly pid: number | undefined
  /** SIGTERM the exporter and wait for it to exit */
  stop(): Promise<void>
}

export function exporterArgs(options: ExporterOptions): string[] {
  return ['--port', String(options.port), '--conf', options.definitionsPath, `--smp=${options.smp}`]
}

function waitForExit(child: ChildProcess): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve()
  }
  return new Promise((resolve) => {
    child.once('exit', () => resolve())
  })
}

/**
 * Spawn the exporter and resolve once it reports readiness
 *
 * @throws ExpocheckError EXPORTER_FAILED if it exits, fails to spawn, or
 *   stays silent past the start timeout
 */
export function startExporter(options: ExporterOptions): Promise<ExporterHandle> {
  const args = exporterArgs(options)
  const timeoutMs = options.startTimeoutMs ?? 30_000
  logger.info({ path: options.exporterPath, args }, 'Starting exporter')

  const child = spawn(options.exporterPath, args, {
    stdio: ['ignore', 'pipe', 'ignore'],
  })

  // Attached for the child's whole lifetime, so a late error such as a failed kill is logged
  child.on('error', (err) => {
    logger.error({ pid: child.pid, err }, 'Exporter process error')
  })

  const handle: ExporterHandle = {
    pid: child.pid,
    async stop() {
      const exited = waitForExit(child)
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM')
      }
      await exited
      logger.info({ pid: child.pid }, 'Exporter stopped')
    },
  }

  return new Promise((resolve, reject) => {
    const stdout = child.stdout
    if (!stdout) {
      child.kill('SIGTERM')
      reject(Errors.exporterFailed('stdout is not available'))
      return
    }
    const reader = createInterface({ input: stdout })

    const settle = () => {
      clearTimeout(timer)
      child.off('exit', onExit)
      child.off('error', onError)
      reader.off('line', onLine)
    }

    const fail = (error: Error) => {
      settle()
      reader.close()
      reject(error)
    }

    const onLine = (line: string) => {
      settle()
      logger.info({ pid: child.pid, line }, 'Exporter ready')
      // Keep draining stdout, or the exporter blocks once the pipe fills
      reader.on('line', (output: string) => {
        logger.debug({ pid: child.pid, line: output }, 'Exporter output')
      })
      resolve(handle)
    }

    const onExit = (code: number | null, signal: NodeJS.Signals | null) => {
      fail(Errors.exporterFailed('exited before becoming ready', { code, signal }))
    }

    const onError = (err: Error) => {
      fail(Errors.exporterFailed(err.message, { path: options.exporterPath }))
    }

    const timer = setTimeout(() => {
      child.kill('SIGTERM')
      fail(Errors.exporterFailed(`not ready after ${timeoutMs}ms`))
    }, timeoutMs)

    reader.once('line', onLine)
    child.once('exit', onExit)
    child.once('error', onError)
  })
}
