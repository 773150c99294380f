import fs from 'fs-extra'
import { isSingleBoardDevice } from './environment.js'
import { installSystemDeps, refreshIndexes, upgradeSystem } from './ensureSystem.js'
import { ensureCoreEnv, isCoreReady } from './ensureCoreEnv.js'
import {
  installConvenienceTools,
  installMqttBroker,
  installNodeService,
  installWebServer,
  NODE_SERVICES,
  nodeServiceInstalled
} from './installServices.js'
import { isLocked } from './locks.js'
import { materializeTemplate } from './materializeTemplate.js'
import { persistState } from './persistState.js'
import { fixWifiApFirmware, grantSerialAccess, hasSerialAccess, repairPermissions, WIFI_FIX_LOCK } from './platformFixes.js'
import { buildCacheFilled, fillBuildCache, platformDownloaded, predownloadPlatforms } from './prefetch.js'
import { BUILD_PLATFORMS } from './pins.js'
import { buildDocs, runVerification } from './postInstall.js'
import type { InstallerContext, InstallOptions } from './types.js'

export interface InstallationStep {
  name: string
  rank: number
  // Steps whose precondition is false are left out of the run entirely.
  when: (options: InstallOptions, ctx: InstallerContext) => boolean
  isDone?: (ctx: InstallerContext, options: InstallOptions) => Promise<boolean>
  run: (ctx: InstallerContext, options: InstallOptions) => Promise<void>
}

export interface StepReport {
  name: string
  status: 'ran' | 'skipped'
}

const always = () => true

// Bundles installed through the package manager; any of them needs fresh indexes.
const INDEXED_BUNDLES = ['web-server', 'mqtt-broker', 'convenience-tools'] as const

export function buildSteps(): InstallationStep[] {
  return [
    {
      name: 'refresh-indexes',
      rank: 1,
      when: (o) => INDEXED_BUNDLES.some((bundle) => o[bundle]),
      isDone: async (ctx, o) => {
        for (const bundle of INDEXED_BUNDLES) {
          if (o[bundle] && !(await isLocked(ctx.env, bundle))) return false
        }
        return true
      },
      run: (ctx) => refreshIndexes(ctx)
    },
    { name: 'system-upgrade', rank: 2, when: (o) => o['do-upgrade'], run: (ctx) => upgradeSystem(ctx) },
    {
      name: 'system-deps',
      rank: 3,
      when: (o) => o['system-deps'],
      isDone: (ctx) => isLocked(ctx.env, 'system-deps'),
      run: (ctx) => installSystemDeps(ctx)
    },
    {
      name: 'core-env',
      rank: 4,
      when: (o) => o['core-env'],
      isDone: (ctx) => isCoreReady(ctx),
      run: (ctx) => ensureCoreEnv(ctx)
    },
    {
      name: 'cloud-file-manager',
      rank: 5.1,
      when: (o) => o['cloud-file-manager'],
      isDone: (ctx) => nodeServiceInstalled(ctx, NODE_SERVICES['cloud-file-manager']),
      run: (ctx) => installNodeService(ctx, NODE_SERVICES['cloud-file-manager'])
    },
    {
      name: 'flow-platform',
      rank: 5.2,
      when: (o) => o['flow-platform'],
      isDone: (ctx) => nodeServiceInstalled(ctx, NODE_SERVICES['flow-platform']),
      run: (ctx) => installNodeService(ctx, NODE_SERVICES['flow-platform'])
    },
    {
      name: 'web-server',
      rank: 5.3,
      when: (o) => o['web-server'],
      isDone: (ctx) => isLocked(ctx.env, 'web-server'),
      run: (ctx) => installWebServer(ctx)
    },
    {
      name: 'mqtt-broker',
      rank: 5.4,
      when: (o) => o['mqtt-broker'],
      isDone: (ctx) => isLocked(ctx.env, 'mqtt-broker'),
      run: (ctx) => installMqttBroker(ctx)
    },
    {
      name: 'convenience-tools',
      rank: 5.5,
      when: (o) => o['convenience-tools'],
      isDone: (ctx) => isLocked(ctx.env, 'convenience-tools'),
      run: (ctx) => installConvenienceTools(ctx)
    },
    {
      name: 'project-template',
      rank: 6,
      when: (o) => o['project-template'],
      isDone: (ctx) => fs.pathExists(ctx.env.projectsDir),
      run: (ctx) => materializeTemplate(ctx)
    },
    {
      name: 'fix-wifi-ap-firmware',
      rank: 7,
      when: (o, ctx) => o['fix-wifi-ap-firmware'] && isSingleBoardDevice(ctx.env),
      isDone: (ctx) => isLocked(ctx.env, WIFI_FIX_LOCK),
      run: (ctx) => fixWifiApFirmware(ctx)
    },
    {
      name: 'repair-permissions',
      rank: 8,
      when: always,
      run: async (ctx) => {
        await repairPermissions(ctx)
      }
    },
    {
      name: 'pre-download-platforms',
      rank: 9,
      when: (o) => o['pre-download-platforms'],
      isDone: async (ctx) => {
        for (const name of BUILD_PLATFORMS) {
          if (!(await platformDownloaded(ctx, name))) return false
        }
        return true
      },
      run: (ctx) => predownloadPlatforms(ctx)
    },
    {
      name: 'fill-build-cache',
      rank: 10,
      when: (o) => o['fill-build-cache'],
      isDone: (ctx) => buildCacheFilled(ctx),
      run: (ctx) => fillBuildCache(ctx)
    },
    { name: 'build-docs', rank: 11, when: always, run: (ctx) => buildDocs(ctx) },
    {
      name: 'fix-serial-permissions',
      rank: 12,
      when: (o) => o['fix-serial-permissions'],
      isDone: (ctx) => hasSerialAccess(ctx),
      run: (ctx) => grantSerialAccess(ctx)
    },
    { name: 'persist-state', rank: 13, when: always, run: (ctx, o) => persistState(o, ctx.env.stateFile) },
    { name: 'verify', rank: 14, when: always, run: (ctx) => runVerification(ctx) }
  ]
}

/**
 * Run steps strictly one after another in rank order. The first failing step
 * aborts the run; nothing already done is rolled back.
 */
export async function runSteps(
  ctx: InstallerContext,
  options: InstallOptions,
  steps: readonly InstallationStep[] = buildSteps()
): Promise<StepReport[]> {
  const reports: StepReport[] = []
  const ordered = [...steps].sort((a, b) => a.rank - b.rank)
  for (const step of ordered) {
    if (!step.when(options, ctx)) continue
    if (step.isDone && (await step.isDone(ctx, options))) {
      ctx.logger.info(`${step.name}: already done, skipping`)
      reports.push({ name: step.name, status: 'skipped' })
      continue
    }
    ctx.logger.info(`==> ${step.name}`)
    await step.run(ctx, options)
    reports.push({ name: step.name, status: 'ran' })
  }
  return reports
}
