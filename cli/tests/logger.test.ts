import { describe, it, expect, vi, afterAll } from 'vitest'
import { promises as fs } from 'fs'
import { join } from 'path'

vi.mock('@clack/prompts', () => ({
  log: { warn: vi.fn(), info: vi.fn(), message: vi.fn(), success: vi.fn(), error: vi.fn() }
}))

import * as p from '@clack/prompts'
import { createLogger } from '../src/installers/logger.js'
import { makeHome } from './helpers.js'

const dirs: string[] = []
afterAll(async () => {
  for (const dir of dirs) await fs.rm(dir, { recursive: true, force: true })
})

describe('createLogger', () => {
  it('prints through clack and appends levelled lines to the log file', async () => {
    const dir = await makeHome('logger')
    dirs.push(dir)
    const file = join(dir, 'logs', 'install.log')
    const logger = createLogger(file)

    logger.ok('runtime ready')
    logger.warn('nginx already configured')

    expect(p.log.success).toHaveBeenCalledWith('runtime ready')
    expect(p.log.warn).toHaveBeenCalledWith('nginx already configured')
    const lines = (await fs.readFile(file, 'utf8')).trimEnd().split('\n')
    expect(lines).toHaveLength(2)
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[ok\] runtime ready$/)
    expect(lines[1]).toMatch(/\[warn\] nginx already configured$/)
  })
})
