import { defineCommand } from 'citty'
import { which } from 'zx'
import { createEnvironment } from '../installers/environment.js'
import { PERSISTED_KEYS, readState } from '../installers/persistState.js'
import type { Environment } from '../installers/types.js'

const TOOLS = ['node', 'nginx', 'mosquitto', 'pio', 'node-red']

export async function renderStatus(env: Environment, tools: readonly string[] = TOOLS): Promise<string> {
  const state = await readState(env.stateFile)
  const lines: string[] = []
  lines.push('')
  lines.push('iotbox: Installation status')
  lines.push('───────────────────────────')
  if (!state) {
    lines.push(`No install record at ${env.stateFile}; run 'iotbox install' first.`)
    return lines.join('\n') + '\n'
  }

  lines.push(`Record: ${env.stateFile}`)
  for (const key of PERSISTED_KEYS) {
    const value = state[key]
    lines.push(`  ${key.padEnd(24)} ${value === undefined ? '?' : value ? 'yes' : 'no'}`)
  }

  const results = await Promise.all(
    tools.map(async (t) => {
      try {
        await which(t)
        return [t, true] as const
      } catch {
        return [t, false] as const
      }
    })
  )
  const present = results.filter(([, ok]) => ok).map(([t]) => t)
  lines.push(`Tools detected: ${present.join(', ') || 'none'}`)
  lines.push('')
  return lines.join('\n') + '\n'
}

export const statusCommand = defineCommand({
  meta: { name: 'status', description: 'Show what the last install selected' },
  async run() {
    process.stdout.write(await renderStatus(createEnvironment()))
  }
})
