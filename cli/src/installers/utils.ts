import { which, $ } from 'zx'
import { spawn } from 'node:child_process'
import { CommandError } from './errors.js'
import type { CommandOptions } from './types.js'

// zx `$` is great for templated calls, but for dynamic
// cmd + args we use Node's spawn for reliability.

export async function needCmd(cmd: string): Promise<boolean> {
  try {
    await which(cmd)
    return true
  } catch {
    return false
  }
}

export async function runCommand(
  cmd: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<void> {
  const cmdStr = formatCommand(cmd, args)
  options.logger?.log(`$ ${cmdStr}`)
  const proc = spawn(cmd, [...args], {
    stdio: 'inherit',
    cwd: options.cwd || process.cwd(),
    env: options.env,
    shell: false
  })
  await new Promise<void>((resolve, reject) => {
    proc.on('error', reject)
    proc.on('exit', (code) => {
      if (code === 0) return resolve()
      reject(new CommandError(cmdStr, code))
    })
  })
}

// Probe helper: stdout of a command, or '' when it is missing or exits non-zero.
export async function readCommandOutput(
  cmd: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<string> {
  const sh = $({
    quiet: true,
    nothrow: true,
    ...(options.env ? { env: options.env } : {}),
    ...(options.cwd ? { cwd: options.cwd } : {})
  })
  const out = await sh`${cmd} ${args}`
  return out.exitCode === 0 ? out.stdout.trim() : ''
}

export function formatCommand(cmd: string, args: readonly string[]): string {
  return [cmd, ...args].map((a) => (a.includes(' ') ? `"${a}"` : a)).join(' ')
}
