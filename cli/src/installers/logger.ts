import * as p from '@clack/prompts'
import fs from 'fs-extra'
import * as path from 'path'
import type { Logger } from './types.js'

export function createLogger(logFile?: string): Logger {
  if (logFile) fs.ensureDirSync(path.dirname(logFile))

  const write = (level: string, msg: string) => {
    if (!logFile) return
    fs.appendFileSync(logFile, `${new Date().toISOString()} [${level}] ${msg}\n`, 'utf8')
  }

  return {
    log: (msg) => { p.log.message(msg); write('log', msg) },
    info: (msg) => { p.log.info(msg); write('info', msg) },
    ok: (msg) => { p.log.success(msg); write('ok', msg) },
    warn: (msg) => { p.log.warn(msg); write('warn', msg) },
    err: (msg) => { p.log.error(msg); write('error', msg) }
  }
}
