import fs from 'fs-extra'
import * as path from 'path'
import { VersionGateError } from './errors.js'
import {
  NODE_MAX_VERSION,
  NODE_MIN_VERSION,
  NVM_INSTALL_URL,
  NVM_MIN_VERSION,
  TOOLCHAIN_ALIAS
} from './pins.js'
import { checkVersion, describeRange, normalizeVersion } from './versionGate.js'
import type { VersionSpec } from './versionGate.js'
import { readCommandOutput, runCommand } from './utils.js'
import type { InstallerContext } from './types.js'

// nvm is a shell function, so every call goes through bash with nvm.sh sourced.
function nvmScript(ctx: InstallerContext, args: string): string {
  return `. "${path.join(ctx.env.nvmDir, 'nvm.sh')}" && nvm ${args}`
}

async function nvmOutput(ctx: InstallerContext, args: string): Promise<string> {
  return readCommandOutput('bash', ['-c', nvmScript(ctx, args)], { env: ctx.platform.commandEnv(ctx.env) })
}

export async function nvm(ctx: InstallerContext, args: string): Promise<void> {
  await runCommand('bash', ['-c', nvmScript(ctx, args)], {
    logger: ctx.logger,
    env: ctx.platform.commandEnv(ctx.env)
  })
}

/** Run a command with the pinned toolchain, addressed by alias. */
export async function withToolchain(
  ctx: InstallerContext,
  cmd: string,
  args: readonly string[],
  cwd?: string
): Promise<void> {
  await runCommand('bash', ['-c', nvmScript(ctx, `exec ${TOOLCHAIN_ALIAS} ${cmd} ${args.join(' ')}`)], {
    logger: ctx.logger,
    env: ctx.platform.commandEnv(ctx.env),
    cwd
  })
}

export function versionManagerSpec(ctx: InstallerContext): VersionSpec {
  return { minimum: NVM_MIN_VERSION, probe: () => nvmOutput(ctx, '--version') }
}

export function toolchainSpec(ctx: InstallerContext): VersionSpec {
  return {
    minimum: NODE_MIN_VERSION,
    maximum: NODE_MAX_VERSION,
    probe: () => nvmOutput(ctx, 'version default')
  }
}

export async function ensureVersionManager(ctx: InstallerContext): Promise<string> {
  const spec = versionManagerSpec(ctx)
  const installed = normalizeVersion(await spec.probe())
  if (checkVersion(installed, spec) === 'ok') {
    ctx.logger.ok(`nvm ${installed}`)
    return installed
  }

  ctx.logger.info(`nvm ${installed} found, installing pinned ${spec.minimum}`)
  await runCommand('bash', ['-c', `curl -fsSL ${NVM_INSTALL_URL} | PROFILE=/dev/null bash`], {
    logger: ctx.logger,
    env: ctx.platform.commandEnv(ctx.env)
  })

  const reinstalled = normalizeVersion(await spec.probe())
  if (checkVersion(reinstalled, spec) !== 'ok') {
    throw new VersionGateError('nvm', reinstalled, describeRange(spec))
  }
  ctx.logger.ok(`nvm ${reinstalled} installed`)
  return reinstalled
}

/**
 * Bring the Node.js runtime inside its bounds. One remediation (install the
 * pinned maximum) and one re-check; anything else is fatal.
 */
export async function ensureToolchainRuntime(ctx: InstallerContext): Promise<string> {
  const spec = toolchainSpec(ctx)
  let installed = normalizeVersion(await spec.probe())
  let result = checkVersion(installed, spec)

  if (result !== 'ok') {
    ctx.logger.warn(`Node.js ${installed} is ${result.replace('_', ' ')} (${describeRange(spec)}); installing ${NODE_MAX_VERSION}`)
    await nvm(ctx, `install ${NODE_MAX_VERSION}`)
    await nvm(ctx, `alias default ${NODE_MAX_VERSION}`)
    installed = normalizeVersion(await spec.probe())
    result = checkVersion(installed, spec)
    if (result !== 'ok') {
      throw new VersionGateError('Node.js', installed, describeRange(spec))
    }
  }

  const aliased = normalizeVersion(await nvmOutput(ctx, `version ${TOOLCHAIN_ALIAS}`))
  if (aliased !== installed) {
    await nvm(ctx, `alias ${TOOLCHAIN_ALIAS} ${installed}`)
  }
  ctx.logger.ok(`Node.js ${installed} available as '${TOOLCHAIN_ALIAS}'`)
  return installed
}

/** Version manager, runtime and the npm workspace the Node-based services install into. */
export async function ensureToolchainWorkspace(ctx: InstallerContext): Promise<void> {
  if (ctx.session.toolchainVersion) return

  await ensureVersionManager(ctx)
  ctx.session.toolchainVersion = await ensureToolchainRuntime(ctx)

  const manifest = path.join(ctx.env.workspaceDir, 'package.json')
  if (await fs.pathExists(manifest)) return
  await fs.ensureDir(ctx.env.workspaceDir)
  await fs.writeJson(manifest, { name: 'iotbox-workspace', private: true, dependencies: {} }, { spaces: 2 })
  ctx.logger.ok(`Toolchain workspace created at ${ctx.env.workspaceDir}`)
}
