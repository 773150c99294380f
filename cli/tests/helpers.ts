import { vi } from 'vitest'
import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { createEnvironment } from '../src/installers/environment.js'
import { PLATFORMS } from '../src/installers/platform.js'
import type { Environment, InstallerContext, Logger, Platform, PlatformId, Prompter } from '../src/installers/types.js'

export function silentLogger(): Logger {
  return { log: vi.fn(), info: vi.fn(), ok: vi.fn(), warn: vi.fn(), err: vi.fn() }
}

export async function makeHome(label: string): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), `iotbox-test-${label}-`))
}

export function makeEnv(home: string, overrides: Partial<Environment> = {}): Environment {
  return createEnvironment({ HOME: home, USER: 'tester', PATH: '/usr/bin:/bin' }, { deviceModel: undefined, ...overrides })
}

export function platformById(id: PlatformId): Platform {
  const platform = PLATFORMS.find((p) => p.id === id)
  if (!platform) throw new Error(`no platform ${id}`)
  return platform
}

export function makeCtx(env: Environment, platform: Platform = platformById('debian')): InstallerContext {
  return { env, platform, logger: silentLogger(), session: {} }
}

/** Answers by question substring; anything unmatched takes the offered default. */
export function scriptedPrompter(answers: Record<string, boolean> = {}) {
  const asked: string[] = []
  const prompter: Prompter = {
    async ask(question, defaultYes) {
      asked.push(question)
      const match = Object.keys(answers).find((fragment) => question.includes(fragment))
      return match === undefined ? defaultYes : answers[match]
    }
  }
  return { prompter, asked }
}
