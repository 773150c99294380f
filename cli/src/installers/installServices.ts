import fs from 'fs-extra'
import * as path from 'path'
import { appendConfigBlock } from './configPatch.js'
import { ensureToolchainWorkspace, withToolchain } from './ensureToolchain.js'
import { installBundle } from './ensureSystem.js'
import { TOOLCHAIN_ALIAS } from './pins.js'
import type { InstallerContext } from './types.js'

interface NodeService {
  option: 'cloud-file-manager' | 'flow-platform'
  npmPackage: string
  bin: string
  alias: string
  args: string
}

export const NODE_SERVICES: Readonly<Record<NodeService['option'], NodeService>> = {
  'cloud-file-manager': {
    option: 'cloud-file-manager',
    npmPackage: 'cloudcmd',
    bin: 'cloudcmd',
    alias: 'iot-files',
    args: '--port 8000 --no-open --root "$HOME"'
  },
  'flow-platform': {
    option: 'flow-platform',
    npmPackage: 'node-red',
    bin: 'node-red',
    alias: 'iot-flows',
    args: '--port 1880 --userDir "$HOME/.node-red"'
  }
}

export function nodeServiceInstalled(ctx: InstallerContext, service: NodeService): Promise<boolean> {
  return fs.pathExists(path.join(ctx.env.workspaceDir, 'node_modules', service.npmPackage))
}

export async function installNodeService(ctx: InstallerContext, service: NodeService): Promise<void> {
  await ensureToolchainWorkspace(ctx)
  ctx.logger.info(`Installing ${service.npmPackage} into ${ctx.env.workspaceDir}`)
  await withToolchain(ctx, 'npm', ['install', '--no-fund', '--no-audit', service.npmPackage], ctx.env.workspaceDir)

  const binPath = path.join(ctx.env.workspaceDir, 'node_modules', '.bin', service.bin)
  await appendConfigBlock(
    ctx.env.shellRcFile,
    service.option,
    `alias ${service.alias}='nvm exec ${TOOLCHAIN_ALIAS} ${binPath} ${service.args}'`,
    ctx.logger
  )
  ctx.logger.ok(`${service.npmPackage} installed; start it with '${service.alias}'`)
}

export function nginxConfigPath(ctx: InstallerContext): string {
  return path.join(ctx.env.dataDir, 'etc', 'nginx', 'iotbox.conf')
}

export function mosquittoConfigPath(ctx: InstallerContext): string {
  return path.join(ctx.env.dataDir, 'etc', 'mosquitto', 'iotbox.conf')
}

const NGINX_PROXY = `server {
    listen 8080;
    location /files/ {
        proxy_pass http://127.0.0.1:8000/;
    }
    location /flows/ {
        proxy_pass http://127.0.0.1:1880/;
        proxy_http_version 1.1;
        proxy_set_header Upgrade $http_upgrade;
        proxy_set_header Connection "upgrade";
    }
}`

const MOSQUITTO_LISTENERS = `listener 1883
allow_anonymous true
listener 9001
protocol websockets`

export async function installWebServer(ctx: InstallerContext): Promise<void> {
  await installBundle(ctx, 'web-server')
  await appendConfigBlock(nginxConfigPath(ctx), 'web-server', NGINX_PROXY, ctx.logger)
  ctx.logger.ok(`nginx installed; include ${nginxConfigPath(ctx)} from your http block`)
}

export async function installMqttBroker(ctx: InstallerContext): Promise<void> {
  await installBundle(ctx, 'mqtt-broker')
  await appendConfigBlock(mosquittoConfigPath(ctx), 'mqtt-broker', MOSQUITTO_LISTENERS, ctx.logger)
  ctx.logger.ok(`mosquitto installed; run it with -c ${mosquittoConfigPath(ctx)}`)
}

export async function installConvenienceTools(ctx: InstallerContext): Promise<void> {
  await installBundle(ctx, 'convenience-tools')
  await appendConfigBlock(
    ctx.env.shellRcFile,
    'convenience-tools',
    `export PATH="${ctx.env.localBinDir}:$PATH"`,
    ctx.logger
  )
}
