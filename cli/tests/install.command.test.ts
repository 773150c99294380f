import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { runCommand } from 'citty'

vi.mock('../src/installers/main.js', () => ({
  runInstaller: vi.fn(async () => [])
}))
vi.mock('../src/installers/platform.js', () => ({
  detectPlatform: vi.fn(async () => ({ id: 'debian', label: 'Debian' }))
}))
vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  note: vi.fn(),
  cancel: vi.fn(),
  text: vi.fn(async () => ''),
  isCancel: (v: unknown) => typeof v === 'symbol',
  log: { warn: vi.fn(), info: vi.fn(), message: vi.fn(), success: vi.fn(), error: vi.fn() }
}))

import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { installCommand } from '../src/commands/install.js'
import { runInstaller } from '../src/installers/main.js'
import { EnvironmentError, UsageError } from '../src/installers/errors.js'

let home: string

beforeEach(async () => {
  vi.clearAllMocks()
  home = await fs.mkdtemp(join(tmpdir(), 'iotbox-test-cli-'))
  vi.stubEnv('HOME', home)
})
afterEach(async () => {
  vi.unstubAllEnvs()
  await fs.rm(home, { recursive: true, force: true })
})

describe('install command', () => {
  it('rejects unknown flags before doing anything', async () => {
    vi.stubEnv('IOTBOX_ENV', 'bootstrap')
    await expect(runCommand(installCommand, { rawArgs: ['--web-server', '--bogus'] })).rejects.toThrow(
      new UsageError('Unknown option(s): --bogus')
    )
    expect(runInstaller).not.toHaveBeenCalled()
  })

  it('prints usage for any help argument and returns normally', async () => {
    vi.stubEnv('IOTBOX_ENV', 'bootstrap')
    await expect(runCommand(installCommand, { rawArgs: ['--web-server', 'help'] })).resolves.toBeDefined()
    expect(runInstaller).not.toHaveBeenCalled()
  })

  it('refuses to run outside the bootstrap shell', async () => {
    vi.stubEnv('IOTBOX_ENV', '')
    await expect(runCommand(installCommand, { rawArgs: ['--web-server'] })).rejects.toBeInstanceOf(EnvironmentError)
    expect(runInstaller).not.toHaveBeenCalled()
  })

  it('checks activation before looking at the arguments', async () => {
    vi.stubEnv('IOTBOX_ENV', '')
    await expect(runCommand(installCommand, { rawArgs: ['help'] })).rejects.toBeInstanceOf(EnvironmentError)
    await expect(runCommand(installCommand, { rawArgs: ['--bogus'] })).rejects.toBeInstanceOf(EnvironmentError)
  })

  it('hands explicit selections to the installer without asking', async () => {
    vi.stubEnv('IOTBOX_ENV', 'bootstrap')
    await runCommand(installCommand, { rawArgs: ['--web-server', '--mqtt-broker'] })
    expect(runInstaller).toHaveBeenCalledTimes(1)
    const [options] = vi.mocked(runInstaller).mock.calls[0] ?? []
    expect(options?.['web-server']).toBe(true)
    expect(options?.['mqtt-broker']).toBe(true)
    // fresh HOME: no runtime yet, so core is forced on
    expect(options?.['core-env']).toBe(true)
    expect(options?.['flow-platform']).toBe(false)
  })
})
