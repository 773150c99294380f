import { readFileSync, accessSync } from 'node:fs'
import { homedir, userInfo } from 'node:os'
import { dirname, join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { EnvironmentError } from './errors.js'
import type { Environment } from './types.js'

export const ACTIVATION_VAR = 'IOTBOX_ENV'
export const ACTIVATION_SENTINEL = 'bootstrap'

const DEVICE_MODEL_PATH = '/proc/device-tree/model'

const __dirname = dirname(fileURLToPath(import.meta.url))

export function findRoot(): string {
  // Walk up to 6 levels looking for templates/project
  let cur = __dirname
  for (let i = 0; i < 6; i++) {
    try {
      accessSync(resolve(cur, 'templates', 'project'))
      return cur
    } catch {
      cur = resolve(cur, '..')
    }
  }
  return resolve(__dirname, '..', '..', '..')
}

function readDeviceModel(): string | undefined {
  try {
    // The device-tree string is NUL-terminated.
    return readFileSync(DEVICE_MODEL_PATH, 'utf8').replace(/\0/g, '').trim() || undefined
  } catch {
    return undefined
  }
}

/**
 * Snapshot everything the installer needs from the process environment.
 * Nothing downstream reads `process.env` again; tests pass `vars` and `overrides` instead.
 */
export function createEnvironment(
  vars: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Environment> = {}
): Environment {
  const homeDir = overrides.homeDir ?? vars.HOME ?? homedir()
  const baseDir = overrides.baseDir ?? join(homeDir, '.iotbox')
  const dataDir = overrides.dataDir ?? join(baseDir, 'local', 'share', 'iotbox')
  const baseVars: Record<string, string> = {}
  for (const [key, value] of Object.entries(vars)) {
    if (typeof value === 'string') baseVars[key] = value
  }

  const env: Environment = {
    homeDir,
    rootDir: findRoot(),
    baseDir,
    runtimeDir: join(baseDir, 'venv'),
    workspaceDir: join(baseDir, 'node-workspace'),
    downloadsDir: join(baseDir, 'downloads'),
    dataDir,
    locksDir: join(dataDir, 'locks'),
    logFile: join(dataDir, 'logs', 'install.log'),
    stateFile: join(dataDir, 'install-state.toml'),
    localBinDir: join(homeDir, '.local', 'bin'),
    projectsDir: join(homeDir, 'iot-projects'),
    shellRcFile: join(homeDir, '.bashrc'),
    nvmDir: vars.NVM_DIR || join(homeDir, '.nvm'),
    prefix: vars.PREFIX ?? '',
    termuxVersion: vars.TERMUX_VERSION,
    deviceModel: 'deviceModel' in overrides ? overrides.deviceModel : readDeviceModel(),
    user: vars.USER || userInfo().username,
    activation: vars[ACTIVATION_VAR],
    baseVars,
    ...overrides
  }
  return Object.freeze(env)
}

export function assertActivated(env: Environment): void {
  if (env.activation !== ACTIVATION_SENTINEL) {
    throw new EnvironmentError(
      `${ACTIVATION_VAR} is not set to "${ACTIVATION_SENTINEL}"; run iotbox from the activated bootstrap shell`
    )
  }
}

export function isSingleBoardDevice(env: Environment): boolean {
  return /raspberry pi/i.test(env.deviceModel ?? '')
}
