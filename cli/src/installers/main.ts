import { runSteps } from './steps.js'
import type { StepReport } from './steps.js'
import type { Environment, InstallOptions, Logger, Platform, InstallerContext } from './types.js'

export async function runInstaller(
  options: InstallOptions,
  env: Environment,
  platform: Platform,
  logger: Logger
): Promise<StepReport[]> {
  const ctx: InstallerContext = { env, platform, logger, session: {} }
  logger.info(`Platform: ${platform.label}`)
  logger.info(`Runtime: ${env.runtimeDir}`)
  const reports = await runSteps(ctx, options)
  logger.ok(`Installation complete (${reports.filter((r) => r.status === 'ran').length} step(s) ran)`)
  return reports
}
