export const OPTION_KEYS = [
  'system-deps',
  'core-env',
  'cloud-file-manager',
  'flow-platform',
  'web-server',
  'mqtt-broker',
  'convenience-tools',
  'project-template',
  'pre-download-platforms',
  'fill-build-cache',
  'fix-serial-permissions',
  'fix-wifi-ap-firmware',
  'do-upgrade',
  'clean'
] as const

export type OptionKey = (typeof OPTION_KEYS)[number]

// Fully resolved: every key is yes/no.
export type InstallOptions = Readonly<Record<OptionKey, boolean>>

// Tri-state: a missing key means "unset".
export type OptionSelection = Partial<Record<OptionKey, boolean>>

export type PlatformId = 'termux' | 'debian' | 'fedora' | 'arch' | 'macos'
export type PackageBundle = 'system-deps' | 'web-server' | 'mqtt-broker' | 'convenience-tools'

export interface Environment {
  readonly homeDir: string
  readonly rootDir: string
  readonly baseDir: string
  readonly runtimeDir: string
  readonly workspaceDir: string
  readonly downloadsDir: string
  readonly dataDir: string
  readonly locksDir: string
  readonly logFile: string
  readonly stateFile: string
  readonly localBinDir: string
  readonly projectsDir: string
  readonly shellRcFile: string
  readonly nvmDir: string
  readonly prefix: string
  readonly termuxVersion: string | undefined
  readonly deviceModel: string | undefined
  readonly user: string
  readonly activation: string | undefined
  readonly baseVars: Readonly<Record<string, string>>
}

export interface CommandOptions {
  logger?: Logger
  cwd?: string
  env?: NodeJS.ProcessEnv
}

export interface Platform {
  readonly id: PlatformId
  readonly label: string
  readonly packages: Readonly<Record<PackageBundle, readonly string[]>>
  // Group granting access to serial devices; undefined where group-based access does not apply.
  readonly serialGroup: string | undefined
  isAvailable(env: Environment): Promise<boolean>
  refreshIndexes(ctx: InstallerContext): Promise<void>
  upgradeAll(ctx: InstallerContext): Promise<void>
  installPackages(ctx: InstallerContext, packages: readonly string[]): Promise<void>
  commandEnv(env: Environment): NodeJS.ProcessEnv
}

export interface Prompter {
  ask(question: string, defaultYes: boolean): Promise<boolean>
}

export interface InstallerSession {
  toolchainVersion?: string
}

export interface InstallerContext {
  env: Environment
  platform: Platform
  logger: Logger
  session: InstallerSession
}

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
}
