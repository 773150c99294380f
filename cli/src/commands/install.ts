import { defineCommand, showUsage } from 'citty'
import * as p from '@clack/prompts'
import { assertActivated, createEnvironment } from '../installers/environment.js'
import { UsageError } from '../installers/errors.js'
import { createLogger } from '../installers/logger.js'
import { runInstaller } from '../installers/main.js'
import { detectPlatform } from '../installers/platform.js'
import { createPrompter } from '../installers/prompt.js'
import { parseFlags, resolveOptions } from '../installers/resolveOptions.js'
import type { InstallOptions } from '../installers/types.js'

export const installCommand = defineCommand({
  meta: {
    name: 'install',
    description: 'Install the runtime, toolchain and selected services. No flags starts the wizard'
  },
  args: {
    default: { type: 'boolean', description: 'Install the default bundle without questions' },
    clean: { type: 'boolean', description: 'Remove the runtime and cached downloads first (asks to confirm)' },
    upgrade: { type: 'boolean', description: 'Upgrade installed system packages first' },
    'system-deps': { type: 'boolean', description: 'System libraries and the Node.js toolchain' },
    'core-env': { type: 'boolean', description: 'Python runtime, core libraries and helper projects' },
    'cloud-file-manager': { type: 'boolean', description: 'Cloud Commander web file manager' },
    'flow-platform': { type: 'boolean', description: 'Node-RED flow editor' },
    'web-server': { type: 'boolean', description: 'nginx reverse proxy' },
    'mqtt-broker': { type: 'boolean', description: 'mosquitto MQTT broker' },
    'convenience-tools': { type: 'boolean', description: 'tmux, htop, mc, jq and friends' },
    'project-template': { type: 'boolean', description: 'Copy example projects to ~/iot-projects' },
    'pre-download-platforms': { type: 'boolean', description: 'Download the ESP32/ESP8266 build platforms' },
    'fill-build-cache': { type: 'boolean', description: 'Build the example projects once to fill the cache (slow)' },
    'fix-serial-permissions': { type: 'boolean', description: 'Add your user to the serial device group' },
    'fix-wifi-ap-firmware': { type: 'boolean', description: 'Raspberry Pi Wi-Fi access point firmware fix' }
  },
  async run({ rawArgs, cmd }) {
    const env = createEnvironment()
    assertActivated(env)

    const flags = parseFlags(rawArgs)
    if (flags.help) {
      await showUsage(cmd)
      return
    }
    if (flags.unknown.length > 0) {
      await showUsage(cmd)
      throw new UsageError(`Unknown option(s): ${flags.unknown.join(' ')}`)
    }

    const logger = createLogger(env.logFile)

    p.intro('iotbox · Install')
    const platform = await detectPlatform(env)
    logger.info(`Detected platform: ${platform.label}`)

    const options = await resolveOptions(flags, { env, platform, prompter: createPrompter(), logger })
    p.note(describeOptions(options), 'Selected')

    try {
      await runInstaller(options, env, platform, logger)
      p.outro('Install finished')
    } catch (error) {
      p.cancel(`Installation failed: ${error}`)
      throw error
    }
  }
})

export function describeOptions(options: InstallOptions): string {
  return Object.entries(options)
    .map(([key, value]) => `${value ? '✔' : '·'} ${key}`)
    .join('\n')
}
