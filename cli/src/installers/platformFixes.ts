import fs from 'fs-extra'
import * as path from 'path'
import { writeLock } from './locks.js'
import { readCommandOutput, runCommand } from './utils.js'
import type { InstallerContext } from './types.js'

export const WIFI_FIX_LOCK = 'fix-wifi-ap-firmware'

export async function fixWifiApFirmware(ctx: InstallerContext): Promise<void> {
  const script = path.join(ctx.env.rootDir, 'scripts', 'fix-wifi-ap-firmware.sh')
  ctx.logger.info(`Applying Wi-Fi access point firmware fix for ${ctx.env.deviceModel ?? 'this board'}`)
  await runCommand('sudo', ['bash', script], { logger: ctx.logger, env: ctx.platform.commandEnv(ctx.env) })
  await writeLock(ctx.env, WIFI_FIX_LOCK)
  ctx.logger.ok('Firmware fix applied; reboot to load it')
}

/** chmod 755 every regular file in the local bin directory. */
export async function repairPermissions(ctx: InstallerContext): Promise<number> {
  const dir = ctx.env.localBinDir
  await fs.ensureDir(dir)
  let repaired = 0
  for (const name of await fs.readdir(dir)) {
    const file = path.join(dir, name)
    // lstat: symlinks are not regular files and their targets live elsewhere
    const stat = await fs.lstat(file)
    if (!stat.isFile()) continue
    if ((stat.mode & 0o777) === 0o755) continue
    await fs.chmod(file, 0o755)
    repaired++
  }
  if (repaired > 0) ctx.logger.ok(`Made ${repaired} file(s) in ${dir} executable`)
  return repaired
}

export async function hasSerialAccess(ctx: InstallerContext): Promise<boolean> {
  const group = ctx.platform.serialGroup
  if (!group) return false
  const groups = await readCommandOutput('id', ['-nG', ctx.env.user])
  return groups.split(/\s+/).includes(group)
}

export async function grantSerialAccess(ctx: InstallerContext): Promise<void> {
  const group = ctx.platform.serialGroup
  if (!group) {
    ctx.logger.warn(`${ctx.platform.label} has no serial group to join; skipping`)
    return
  }
  await runCommand('sudo', ['usermod', '-a', '-G', group, ctx.env.user], { logger: ctx.logger })
  ctx.logger.ok(`Added ${ctx.env.user} to '${group}'; log out and back in to use serial ports`)
}
