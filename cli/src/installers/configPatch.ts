import fs from 'fs-extra'
import * as path from 'path'
import type { Logger } from './types.js'

export function blockStart(name: string): string {
  return `# >>> iotbox:${name} >>>`
}

export function blockEnd(name: string): string {
  return `# <<< iotbox:${name} <<<`
}

/**
 * Append a marked block unless its sentinel (the start marker) is already present.
 * Returns true when the file was changed.
 */
export async function appendConfigBlock(
  file: string,
  name: string,
  body: string,
  logger?: Logger
): Promise<boolean> {
  const sentinel = blockStart(name)
  const current = (await fs.pathExists(file)) ? await fs.readFile(file, 'utf8') : ''
  if (current.split('\n').some((line) => line.trim() === sentinel)) {
    logger?.info(`${file} already contains ${name} block, skipping`)
    return false
  }

  const separator = current === '' || current.endsWith('\n') ? '' : '\n'
  const block = [sentinel, body.trimEnd(), blockEnd(name)].join('\n')
  await fs.ensureDir(path.dirname(file))
  await fs.appendFile(file, `${separator}${block}\n`, 'utf8')
  logger?.ok(`Added ${name} block to ${file}`)
  return true
}
