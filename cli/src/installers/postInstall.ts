import * as path from 'path'
import { runCommand } from './utils.js'
import type { InstallerContext } from './types.js'

function scriptEnv(ctx: InstallerContext): NodeJS.ProcessEnv {
  return {
    ...ctx.platform.commandEnv(ctx.env),
    IOTBOX_RUNTIME: ctx.env.runtimeDir,
    IOTBOX_STATE_FILE: ctx.env.stateFile
  }
}

export async function buildDocs(ctx: InstallerContext): Promise<void> {
  await runCommand('bash', [path.join(ctx.env.rootDir, 'scripts', 'build-docs.sh')], {
    logger: ctx.logger,
    env: scriptEnv(ctx),
    cwd: ctx.env.rootDir
  })
}

// A failing suite fails the install.
export async function runVerification(ctx: InstallerContext): Promise<void> {
  ctx.logger.info('Running post-install verification')
  await runCommand('bash', [path.join(ctx.env.rootDir, 'scripts', 'verify.sh')], {
    logger: ctx.logger,
    env: scriptEnv(ctx),
    cwd: ctx.env.rootDir
  })
  ctx.logger.ok('Verification passed')
}
