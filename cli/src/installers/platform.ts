import * as path from 'path'
import { UnsupportedPlatformError } from './errors.js'
import { needCmd, runCommand } from './utils.js'
import type { Environment, InstallerContext, PackageBundle, Platform, PlatformId } from './types.js'

interface PackageManagerProfile {
  id: PlatformId
  label: string
  // argv prefix shared by every package-manager call, e.g. ['sudo', 'apt-get']
  base: readonly string[]
  refresh: readonly string[]
  upgrade: readonly string[]
  install: readonly string[]
  serialGroup: string | undefined
  packages: Record<PackageBundle, readonly string[]>
  isAvailable(env: Environment): Promise<boolean>
  commandEnv?(env: Environment): NodeJS.ProcessEnv
}

function createPlatform(profile: PackageManagerProfile): Platform {
  const [bin, ...prefix] = profile.base
  const pm = (ctx: InstallerContext, args: readonly string[]) =>
    runCommand(bin, [...prefix, ...args], { logger: ctx.logger, env: platform.commandEnv(ctx.env) })

  const platform: Platform = {
    id: profile.id,
    label: profile.label,
    packages: profile.packages,
    serialGroup: profile.serialGroup,
    isAvailable: (env) => profile.isAvailable(env),
    refreshIndexes: (ctx) => pm(ctx, profile.refresh),
    upgradeAll: (ctx) => pm(ctx, profile.upgrade),
    async installPackages(ctx, packages) {
      if (packages.length === 0) return
      await pm(ctx, [...profile.install, ...packages])
    },
    commandEnv: (env) =>
      profile.commandEnv ? profile.commandEnv(env) : { ...env.baseVars, NVM_DIR: env.nvmDir }
  }
  return platform
}

const termux = createPlatform({
  id: 'termux',
  label: 'Termux (Android)',
  base: ['pkg'],
  refresh: ['update', '-y'],
  upgrade: ['upgrade', '-y'],
  install: ['install', '-y'],
  serialGroup: undefined,
  packages: {
    'system-deps': ['python', 'git', 'clang', 'make', 'binutils', 'libffi', 'openssl', 'curl'],
    'web-server': ['nginx'],
    'mqtt-broker': ['mosquitto'],
    'convenience-tools': ['tmux', 'htop', 'mc', 'jq', 'termux-api']
  },
  isAvailable: async (env) =>
    (Boolean(env.termuxVersion) || env.prefix.includes('com.termux')) && (await needCmd('pkg')),
  // Termux preloads libtermux-exec; compiled extensions only link when it is
  // neutralised and the loader searches $PREFIX/lib.
  commandEnv: (env) => ({
    ...env.baseVars,
    NVM_DIR: env.nvmDir,
    LD_PRELOAD: '',
    LD_LIBRARY_PATH: path.join(env.prefix, 'lib')
  })
})

const debian = createPlatform({
  id: 'debian',
  label: 'Debian / Ubuntu / Raspberry Pi OS',
  base: ['sudo', 'apt-get'],
  refresh: ['update', '-y'],
  upgrade: ['upgrade', '-y'],
  install: ['install', '-y'],
  serialGroup: 'dialout',
  packages: {
    'system-deps': ['python3', 'python3-venv', 'python3-dev', 'git', 'build-essential', 'libffi-dev', 'libssl-dev', 'curl'],
    'web-server': ['nginx'],
    'mqtt-broker': ['mosquitto', 'mosquitto-clients'],
    'convenience-tools': ['tmux', 'htop', 'mc', 'jq', 'picocom']
  },
  isAvailable: () => needCmd('apt-get')
})

const fedora = createPlatform({
  id: 'fedora',
  label: 'Fedora / RHEL',
  base: ['sudo', 'dnf'],
  refresh: ['makecache', '-y'],
  upgrade: ['upgrade', '-y'],
  install: ['install', '-y'],
  serialGroup: 'dialout',
  packages: {
    'system-deps': ['python3', 'python3-devel', 'git', 'gcc', 'make', 'libffi-devel', 'openssl-devel', 'curl'],
    'web-server': ['nginx'],
    'mqtt-broker': ['mosquitto'],
    'convenience-tools': ['tmux', 'htop', 'mc', 'jq', 'picocom']
  },
  isAvailable: () => needCmd('dnf')
})

const arch = createPlatform({
  id: 'arch',
  label: 'Arch Linux',
  base: ['sudo', 'pacman'],
  refresh: ['-Sy'],
  upgrade: ['-Syu', '--noconfirm'],
  install: ['-S', '--needed', '--noconfirm'],
  serialGroup: 'uucp',
  packages: {
    'system-deps': ['python', 'git', 'base-devel', 'libffi', 'openssl', 'curl'],
    'web-server': ['nginx'],
    'mqtt-broker': ['mosquitto'],
    'convenience-tools': ['tmux', 'htop', 'mc', 'jq', 'picocom']
  },
  isAvailable: () => needCmd('pacman')
})

const macos = createPlatform({
  id: 'macos',
  label: 'macOS (Homebrew)',
  base: ['brew'],
  refresh: ['update'],
  upgrade: ['upgrade'],
  install: ['install'],
  serialGroup: undefined,
  packages: {
    'system-deps': ['python@3.12', 'git', 'libffi', 'openssl', 'curl'],
    'web-server': ['nginx'],
    'mqtt-broker': ['mosquitto'],
    'convenience-tools': ['tmux', 'htop', 'midnight-commander', 'jq', 'picocom']
  },
  isAvailable: () => needCmd('brew')
})

// Precedence, not mere presence: Termux also ships apt, so it must be checked first.
export const PLATFORMS: readonly Platform[] = [termux, debian, fedora, arch, macos]

export async function detectPlatform(
  env: Environment,
  candidates: readonly Platform[] = PLATFORMS
): Promise<Platform> {
  for (const platform of candidates) {
    if (await platform.isAvailable(env)) return platform
  }
  throw new UnsupportedPlatformError(candidates.map((c) => c.id))
}
