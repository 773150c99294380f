import fs from 'fs-extra'
import * as path from 'path'
import type { Environment } from './types.js'

// Lock files record finished package installs; they live outside the runtime so `clean` keeps them.

export function lockPath(env: Environment, name: string): string {
  return path.join(env.locksDir, `${name}.lock`)
}

export function isLocked(env: Environment, name: string): Promise<boolean> {
  return fs.pathExists(lockPath(env, name))
}

export async function writeLock(env: Environment, name: string): Promise<void> {
  await fs.ensureDir(env.locksDir)
  await fs.writeFile(lockPath(env, name), `${new Date().toISOString()}\n`, 'utf8')
}
