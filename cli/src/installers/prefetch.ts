import fs from 'fs-extra'
import * as path from 'path'
import { corePaths } from './ensureCoreEnv.js'
import { BUILD_PLATFORMS } from './pins.js'
import { runCommand } from './utils.js'
import type { InstallerContext } from './types.js'

export function platformioDirs(ctx: InstallerContext) {
  return {
    coreDir: path.join(ctx.env.downloadsDir, 'platformio'),
    cacheDir: path.join(ctx.env.downloadsDir, 'build-cache')
  }
}

function pioEnv(ctx: InstallerContext): NodeJS.ProcessEnv {
  const dirs = platformioDirs(ctx)
  return {
    ...ctx.platform.commandEnv(ctx.env),
    PLATFORMIO_CORE_DIR: dirs.coreDir,
    PLATFORMIO_BUILD_CACHE_DIR: dirs.cacheDir
  }
}

export function platformDownloaded(ctx: InstallerContext, name: string): Promise<boolean> {
  return fs.pathExists(path.join(platformioDirs(ctx).coreDir, 'platforms', name))
}

export async function predownloadPlatforms(ctx: InstallerContext): Promise<void> {
  for (const name of BUILD_PLATFORMS) {
    if (await platformDownloaded(ctx, name)) {
      ctx.logger.info(`${name} already downloaded, skipping`)
      continue
    }
    ctx.logger.info(`Downloading build platform ${name}`)
    await runCommand(corePaths(ctx).pio, ['pkg', 'install', '--global', '--platform', name], {
      logger: ctx.logger,
      env: pioEnv(ctx)
    })
  }
}

export async function buildCacheFilled(ctx: InstallerContext): Promise<boolean> {
  const { cacheDir } = platformioDirs(ctx)
  if (!(await fs.pathExists(cacheDir))) return false
  return (await fs.readdir(cacheDir)).length > 0
}

/** Build every template project once so later builds hit the cache. Slow. */
export async function fillBuildCache(ctx: InstallerContext): Promise<void> {
  const templates = path.join(ctx.env.rootDir, 'templates', 'project')
  await fs.ensureDir(platformioDirs(ctx).cacheDir)
  ctx.logger.warn('Filling the build cache; this can take a long time')
  for (const entry of await fs.readdir(templates)) {
    const projectDir = path.join(templates, entry)
    if (!(await fs.pathExists(path.join(projectDir, 'platformio.ini')))) continue
    await runCommand(corePaths(ctx).pio, ['run', '-d', projectDir], { logger: ctx.logger, env: pioEnv(ctx) })
  }
  ctx.logger.ok('Build cache filled')
}
