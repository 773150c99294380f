import fs from 'fs-extra'
import { CleanDeclinedError } from './errors.js'
import { isSingleBoardDevice } from './environment.js'
import { OPTION_KEYS } from './types.js'
import type {
  Environment,
  InstallOptions,
  Logger,
  OptionKey,
  OptionSelection,
  Platform,
  Prompter
} from './types.js'

export const FLAG_NAMES: Readonly<Record<OptionKey, string>> = {
  'system-deps': 'system-deps',
  'core-env': 'core-env',
  'cloud-file-manager': 'cloud-file-manager',
  'flow-platform': 'flow-platform',
  'web-server': 'web-server',
  'mqtt-broker': 'mqtt-broker',
  'convenience-tools': 'convenience-tools',
  'project-template': 'project-template',
  'pre-download-platforms': 'pre-download-platforms',
  'fill-build-cache': 'fill-build-cache',
  'fix-serial-permissions': 'fix-serial-permissions',
  'fix-wifi-ap-firmware': 'fix-wifi-ap-firmware',
  'do-upgrade': 'upgrade',
  clean: 'clean'
}

const FLAG_TO_KEY = new Map<string, OptionKey>(OPTION_KEYS.map((key): [string, OptionKey] => [FLAG_NAMES[key], key]))

export interface ParsedFlags {
  selection: OptionSelection
  useDefault: boolean
  help: boolean
  unknown: string[]
  // Recognised flags, --clean and --default included.
  count: number
}

export function parseFlags(rawArgs: readonly string[]): ParsedFlags {
  const parsed: ParsedFlags = { selection: {}, useDefault: false, help: false, unknown: [], count: 0 }
  for (const arg of rawArgs) {
    if (arg.includes('help')) {
      parsed.help = true
      continue
    }
    const name = arg.startsWith('--') ? arg.slice(2) : undefined
    if (name === 'default') {
      parsed.useDefault = true
      parsed.count++
      continue
    }
    const negated = name?.startsWith('no-') ?? false
    const key = name === undefined ? undefined : FLAG_TO_KEY.get(negated ? name.slice(3) : name)
    if (key === undefined) {
      parsed.unknown.push(arg)
      continue
    }
    parsed.selection[key] = !negated
    parsed.count++
  }
  return parsed
}

interface Question {
  key: OptionKey
  question: string
  defaultYes: boolean
  applies?: (env: Environment, platform: Platform) => boolean
}

export const QUESTIONS: readonly Question[] = [
  { key: 'do-upgrade', question: 'Upgrade installed system packages first?', defaultYes: true },
  { key: 'system-deps', question: 'Install system dependencies and the Node.js toolchain?', defaultYes: true },
  { key: 'core-env', question: 'Create or update the core Python environment?', defaultYes: true },
  { key: 'cloud-file-manager', question: 'Install the Cloud Commander web file manager?', defaultYes: true },
  { key: 'flow-platform', question: 'Install Node-RED?', defaultYes: true },
  { key: 'web-server', question: 'Install the nginx reverse proxy?', defaultYes: true },
  { key: 'mqtt-broker', question: 'Install the mosquitto MQTT broker?', defaultYes: true },
  { key: 'convenience-tools', question: 'Install convenience CLI tools?', defaultYes: true },
  { key: 'project-template', question: 'Copy the example project templates?', defaultYes: true },
  { key: 'pre-download-platforms', question: 'Pre-download the ESP32 and ESP8266 build platforms?', defaultYes: true },
  { key: 'fill-build-cache', question: 'Fill the build cache now (can take a long time)?', defaultYes: false },
  {
    key: 'fix-serial-permissions',
    question: 'Grant your user access to serial ports?',
    defaultYes: true,
    applies: (_env, platform) => platform.id !== 'termux'
  },
  {
    key: 'fix-wifi-ap-firmware',
    question: 'Apply the Wi-Fi access point firmware fix?',
    defaultYes: true,
    applies: (env) => isSingleBoardDevice(env)
  }
]

export interface ResolveContext {
  env: Environment
  platform: Platform
  prompter: Prompter
  logger: Logger
}

// Unset options resolve to "no".
export function completeOptions(s: OptionSelection): InstallOptions {
  return {
    'system-deps': s['system-deps'] ?? false,
    'core-env': s['core-env'] ?? false,
    'cloud-file-manager': s['cloud-file-manager'] ?? false,
    'flow-platform': s['flow-platform'] ?? false,
    'web-server': s['web-server'] ?? false,
    'mqtt-broker': s['mqtt-broker'] ?? false,
    'convenience-tools': s['convenience-tools'] ?? false,
    'project-template': s['project-template'] ?? false,
    'pre-download-platforms': s['pre-download-platforms'] ?? false,
    'fill-build-cache': s['fill-build-cache'] ?? false,
    'fix-serial-permissions': s['fix-serial-permissions'] ?? false,
    'fix-wifi-ap-firmware': s['fix-wifi-ap-firmware'] ?? false,
    'do-upgrade': s['do-upgrade'] ?? false,
    clean: s.clean ?? false
  }
}

export function defaultBundle(env: Environment, clean: boolean): InstallOptions {
  return {
    'system-deps': true,
    'core-env': true,
    'cloud-file-manager': true,
    'flow-platform': true,
    'web-server': true,
    'mqtt-broker': true,
    'convenience-tools': true,
    'project-template': true,
    'pre-download-platforms': true,
    'fill-build-cache': false,
    'fix-serial-permissions': true,
    'fix-wifi-ap-firmware': isSingleBoardDevice(env),
    'do-upgrade': true,
    clean
  }
}

export async function cleanInstallation(ctx: ResolveContext): Promise<void> {
  const confirmed = await ctx.prompter.ask(
    `Remove the runtime (${ctx.env.runtimeDir}) and all cached downloads?`,
    false
  )
  if (!confirmed) throw new CleanDeclinedError()
  for (const dir of [ctx.env.runtimeDir, ctx.env.workspaceDir, ctx.env.downloadsDir]) {
    await fs.remove(dir)
    ctx.logger.info(`Removed ${dir}`)
  }
}

/**
 * Flags -> fully resolved options. Precedence:
 * clean (confirm, then continue) > core forcing > --default > explicit flags, where any
 * flag other than --clean suppresses the wizard and leaves unset options at "no".
 */
export async function resolveOptions(flags: ParsedFlags, ctx: ResolveContext): Promise<InstallOptions> {
  let otherFlags = flags.count
  const selection: OptionSelection = { ...flags.selection }

  if (selection.clean) {
    await cleanInstallation(ctx)
    otherFlags--
  }

  if (!(await fs.pathExists(ctx.env.runtimeDir))) {
    ctx.logger.info('No runtime found; the core environment will be created')
    selection['core-env'] = true
  }

  if (flags.useDefault) return defaultBundle(ctx.env, selection.clean ?? false)

  if (otherFlags > 0) return completeOptions(selection)

  for (const q of QUESTIONS) {
    if (selection[q.key] !== undefined) continue
    if (q.applies && !q.applies(ctx.env, ctx.platform)) continue
    selection[q.key] = await ctx.prompter.ask(q.question, q.defaultYes)
  }
  return completeOptions(selection)
}
