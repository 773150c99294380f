import fs from 'fs-extra'
import * as path from 'path'
import * as TOML from 'toml'
import type { InstallOptions, OptionKey } from './types.js'

export const PERSISTED_KEYS = [
  'core-env',
  'cloud-file-manager',
  'flow-platform',
  'web-server',
  'mqtt-broker',
  'fix-serial-permissions',
  'fix-wifi-ap-firmware',
  'convenience-tools',
  'project-template',
  'fill-build-cache'
] as const satisfies readonly OptionKey[]

export type PersistedKey = (typeof PERSISTED_KEYS)[number]
export type PersistedState = Partial<Record<PersistedKey, boolean>>

export function serializeState(options: InstallOptions): string {
  const lines = ['# Written by iotbox install; overwritten on every run', '']
  for (const key of PERSISTED_KEYS) lines.push(`${key} = ${options[key]}`)
  return lines.join('\n') + '\n'
}

/** Overwrite the record; never merged with an earlier one. */
export async function persistState(options: InstallOptions, file: string): Promise<void> {
  await fs.ensureDir(path.dirname(file))
  await fs.writeFile(file, serializeState(options), 'utf8')
}

// Only `iotbox status` and external tooling read this back; the installer itself never does.
export async function readState(file: string): Promise<PersistedState | undefined> {
  if (!(await fs.pathExists(file))) return undefined
  const data: unknown = TOML.parse(await fs.readFile(file, 'utf8'))
  if (typeof data !== 'object' || data === null) return {}
  const state: PersistedState = {}
  for (const key of PERSISTED_KEYS) {
    const value: unknown = Reflect.get(data, key)
    if (typeof value === 'boolean') state[key] = value
  }
  return state
}
