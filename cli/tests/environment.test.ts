import { describe, it, expect } from 'vitest'
import { existsSync } from 'fs'
import { join } from 'path'
import { assertActivated, createEnvironment, isSingleBoardDevice } from '../src/installers/environment.js'
import { EnvironmentError } from '../src/installers/errors.js'

const vars = { HOME: '/home/tester', USER: 'tester', IOTBOX_ENV: 'bootstrap' }

describe('createEnvironment', () => {
  it('derives every path from HOME', () => {
    const env = createEnvironment(vars, { deviceModel: undefined })
    expect(env.runtimeDir).toBe('/home/tester/.iotbox/venv')
    expect(env.stateFile).toBe('/home/tester/.iotbox/local/share/iotbox/install-state.toml')
    expect(env.localBinDir).toBe('/home/tester/.local/bin')
    expect(env.projectsDir).toBe('/home/tester/iot-projects')
  })

  it('finds the repository root holding the templates', () => {
    const env = createEnvironment(vars, { deviceModel: undefined })
    expect(existsSync(join(env.rootDir, 'templates', 'project'))).toBe(true)
  })

  it('is frozen', () => {
    const env = createEnvironment(vars, { deviceModel: undefined })
    expect(Object.isFrozen(env)).toBe(true)
  })
})

describe('assertActivated', () => {
  it('passes inside the bootstrap shell', () => {
    expect(() => assertActivated(createEnvironment(vars, { deviceModel: undefined }))).not.toThrow()
  })

  it('fails without the marker', () => {
    const env = createEnvironment({ HOME: '/home/tester', USER: 'tester' }, { deviceModel: undefined })
    expect(() => assertActivated(env)).toThrow(EnvironmentError)
  })

  it('fails on a wrong marker value', () => {
    const env = createEnvironment({ ...vars, IOTBOX_ENV: '1' }, { deviceModel: undefined })
    expect(() => assertActivated(env)).toThrow('IOTBOX_ENV is not set to "bootstrap"')
  })
})

describe('isSingleBoardDevice', () => {
  it('matches Raspberry Pi models only', () => {
    expect(isSingleBoardDevice(createEnvironment(vars, { deviceModel: 'Raspberry Pi 5 Model B Rev 1.0' }))).toBe(true)
    expect(isSingleBoardDevice(createEnvironment(vars, { deviceModel: 'Pine64 RockPro64' }))).toBe(false)
    expect(isSingleBoardDevice(createEnvironment(vars, { deviceModel: undefined }))).toBe(false)
  })
})
