import { describe, it, expect, vi, beforeEach } from 'vitest'
import { PassThrough } from 'node:stream'
import { ChildProcess, spawn } from 'node:child_process'
import { startExporter } from './process.js'

vi.mock('node:child_process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:child_process')>()
  return { ...actual, spawn: vi.fn() }
})

function fakeChild(): { child: ChildProcess; stdout: PassThrough } {
  const child = new ChildProcess()
  const stdout = new PassThrough()
  child.stdout = stdout
  vi.mocked(spawn).mockReturnValue(child)
  return { child, stdout }
}

const OPTIONS = { exporterPath: './exporter', definitionsPath: 'conf.yaml', port: 10001, smp: 2 }

describe('startExporter events', () => {
  beforeEach(() => {
    vi.mocked(spawn).mockReset()
  })

  it('should keep handling process errors after the exporter is ready', async () => {
    const { child, stdout } = fakeChild()

    const started = startExporter(OPTIONS)
    stdout.write('listening\n')
    await started

    expect(() => child.emit('error', new Error('kill EPERM'))).not.toThrow()
  })

  it('should keep stdout flowing after the readiness line', async () => {
    const { stdout } = fakeChild()

    const started = startExporter(OPTIONS)
    stdout.write('listening\nmore output\n')
    await started

    expect(stdout.readableFlowing).toBe(true)
  })
})
