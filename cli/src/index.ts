import { defineCommand } from 'citty'
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join } from 'path'
import { installCommand } from './commands/install.js'
import { statusCommand } from './commands/status.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, '../package.json'), 'utf-8')
)
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
    ? String(packageJson.version)
    : '0.0.0'

export const root = defineCommand({
  meta: {
    name: 'iotbox',
    version,
    description: 'Bootstrap an IoT development environment'
  },
  subCommands: {
    install: installCommand,
    status: statusCommand
  }
})
