import { ensureVersionManager } from './ensureToolchain.js'
import { writeLock } from './locks.js'
import { needCmd } from './utils.js'
import type { InstallerContext, PackageBundle } from './types.js'

export async function refreshIndexes(ctx: InstallerContext): Promise<void> {
  ctx.logger.info(`Refreshing ${ctx.platform.label} package lists`)
  await ctx.platform.refreshIndexes(ctx)
}

export async function upgradeSystem(ctx: InstallerContext): Promise<void> {
  ctx.logger.info('Upgrading installed packages')
  await ctx.platform.upgradeAll(ctx)
  ctx.logger.ok('System upgraded')
}

/** Install a platform bundle and lock it; the lock name is the bundle name. */
export async function installBundle(ctx: InstallerContext, bundle: PackageBundle): Promise<void> {
  const packages = ctx.platform.packages[bundle]
  ctx.logger.info(`Installing ${bundle}: ${packages.join(' ')}`)
  await ctx.platform.installPackages(ctx, packages)
  await writeLock(ctx.env, bundle)
}

export async function installSystemDeps(ctx: InstallerContext): Promise<void> {
  await installBundle(ctx, 'system-deps')

  if (!(await needCmd('git'))) {
    ctx.logger.warn('git still not on PATH; helper projects cannot be cloned')
  }

  await ensureVersionManager(ctx)
}
