import fs from 'fs-extra'
import * as path from 'path'
import { ensureToolchainWorkspace } from './ensureToolchain.js'
import { HELPER_PROJECTS } from './pins.js'
import { runCommand } from './utils.js'
import type { InstallerContext } from './types.js'

export const CORE_MARKER = '.iotbox-core'
const MANIFEST_MARKER = '.iotbox-manifest'
const HELPER_MARKER = '.iotbox-installed'

export function corePaths(ctx: InstallerContext) {
  const runtimeDir = ctx.env.runtimeDir
  return {
    python: path.join(runtimeDir, 'bin', 'python'),
    pip: path.join(runtimeDir, 'bin', 'pip'),
    pio: path.join(runtimeDir, 'bin', 'pio'),
    srcDir: path.join(runtimeDir, 'src'),
    marker: path.join(runtimeDir, CORE_MARKER)
  }
}

export function isCoreReady(ctx: InstallerContext): Promise<boolean> {
  return fs.pathExists(corePaths(ctx).marker)
}

export async function ensureCoreEnv(ctx: InstallerContext): Promise<void> {
  const paths = corePaths(ctx)
  const run = (cmd: string, args: readonly string[], cwd?: string) =>
    runCommand(cmd, args, { logger: ctx.logger, env: ctx.platform.commandEnv(ctx.env), cwd })

  if (await fs.pathExists(ctx.env.runtimeDir)) {
    ctx.logger.info(`Runtime already exists at ${ctx.env.runtimeDir}`)
  } else {
    ctx.logger.info(`Creating runtime at ${ctx.env.runtimeDir}`)
    await run('python3', ['-m', 'venv', ctx.env.runtimeDir])
  }
  await fs.ensureDir(ctx.env.runtimeDir)

  const manifestMarker = path.join(ctx.env.runtimeDir, MANIFEST_MARKER)
  if (!(await fs.pathExists(manifestMarker))) {
    const requirements = path.join(ctx.env.rootDir, 'templates', 'core-requirements.txt')
    await run(paths.pip, ['install', '--upgrade', 'pip', 'wheel'])
    await run(paths.pip, ['install', '-r', requirements])
    await fs.writeFile(manifestMarker, `${requirements}\n`, 'utf8')
    ctx.logger.ok('Core libraries installed')
  }

  await fs.ensureDir(paths.srcDir)
  for (const helper of HELPER_PROJECTS) {
    const dest = path.join(paths.srcDir, helper.name)
    const installed = path.join(dest, HELPER_MARKER)
    if (await fs.pathExists(installed)) {
      ctx.logger.info(`${helper.name} already installed, skipping`)
      continue
    }
    if (await fs.pathExists(dest)) {
      ctx.logger.info(`${helper.name} already cloned`)
    } else {
      await run('git', ['clone', '--depth', '1', helper.url, dest])
    }
    await run(paths.pip, ['install', '-e', dest])
    await fs.outputFile(installed, `${helper.url}\n`, 'utf8')
    ctx.logger.ok(`${helper.name} installed`)
  }

  await ensureToolchainWorkspace(ctx)
  await fs.writeFile(paths.marker, `${new Date().toISOString()}\n`, 'utf8')
  ctx.logger.ok('Core environment ready')
}
