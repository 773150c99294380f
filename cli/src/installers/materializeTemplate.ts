import fs from 'fs-extra'
import * as path from 'path'
import { EnvironmentError } from './errors.js'
import type { InstallerContext } from './types.js'

export function templateSource(ctx: InstallerContext): string {
  return path.join(ctx.env.rootDir, 'templates', 'project')
}

export async function materializeTemplate(ctx: InstallerContext): Promise<void> {
  const src = templateSource(ctx)
  const dest = ctx.env.projectsDir

  if (await fs.pathExists(dest)) {
    ctx.logger.warn(`${dest} already exists, skipping`)
    return
  }
  if (!(await fs.pathExists(src))) {
    throw new EnvironmentError(`Template directory missing at ${src}`)
  }

  ctx.logger.info(`Copying example projects to ${dest}`)
  await fs.copy(src, dest)
  ctx.logger.ok(`Example projects ready in ${dest}`)
}
