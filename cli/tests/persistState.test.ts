import { describe, it, expect, afterAll } from 'vitest'
import { promises as fs } from 'fs'
import { join } from 'path'
import { persistState, readState, serializeState } from '../src/installers/persistState.js'
import { completeOptions, defaultBundle } from '../src/installers/resolveOptions.js'
import { renderStatus } from '../src/commands/status.js'
import { makeEnv, makeHome } from './helpers.js'

const dirs: string[] = []
afterAll(async () => {
  for (const dir of dirs) await fs.rm(dir, { recursive: true, force: true })
})

async function tempEnv() {
  const home = await makeHome('state')
  dirs.push(home)
  return makeEnv(home)
}

describe('persistState', () => {
  it('writes exactly the persisted keys, in order', () => {
    const text = serializeState(completeOptions({ 'core-env': true, 'web-server': true, 'do-upgrade': true }))
    expect(text).toBe(
      [
        '# Written by iotbox install; overwritten on every run',
        '',
        'core-env = true',
        'cloud-file-manager = false',
        'flow-platform = false',
        'web-server = true',
        'mqtt-broker = false',
        'fix-serial-permissions = false',
        'fix-wifi-ap-firmware = false',
        'convenience-tools = false',
        'project-template = false',
        'fill-build-cache = false',
        ''
      ].join('\n')
    )
  })

  it('overwrites the previous record instead of merging', async () => {
    const env = await tempEnv()
    await persistState(defaultBundle(env, false), env.stateFile)
    await persistState(completeOptions({ 'mqtt-broker': true }), env.stateFile)

    const state = await readState(env.stateFile)
    expect(state?.['mqtt-broker']).toBe(true)
    expect(state?.['web-server']).toBe(false)
    expect(state?.['core-env']).toBe(false)
    expect(Object.keys(state ?? {})).toHaveLength(10)
  })

  it('reads nothing when no record exists', async () => {
    const env = await tempEnv()
    await expect(readState(env.stateFile)).resolves.toBeUndefined()
  })
})

describe('renderStatus', () => {
  it('lists the recorded selection', async () => {
    const env = await tempEnv()
    await persistState(completeOptions({ 'web-server': true }), env.stateFile)
    const lines = (await renderStatus(env, [])).split('\n')
    expect(lines).toContain(`Record: ${env.stateFile}`)
    expect(lines).toContain(`  ${'web-server'.padEnd(24)} yes`)
    expect(lines).toContain(`  ${'mqtt-broker'.padEnd(24)} no`)
    expect(lines).toContain('Tools detected: none')
  })

  it('points at install when there is no record', async () => {
    const env = await tempEnv()
    const out = await renderStatus(env, [])
    expect(out).toContain(`No install record at ${join(env.dataDir, 'install-state.toml')}; run 'iotbox install' first.`)
  })
})
