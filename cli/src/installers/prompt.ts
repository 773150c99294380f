import * as p from '@clack/prompts'
import { WizardAbortedError } from './errors.js'
import type { Prompter } from './types.js'

export const INVALID_ANSWER = 'Invalid input, please answer y or n'

/** Interpret one answer: true/false for y/n, the default for empty input, undefined otherwise. */
export function parseAnswer(raw: string, defaultYes: boolean): boolean | undefined {
  const answer = raw.trim().toLowerCase()
  if (answer === '') return defaultYes
  if (answer === 'y') return true
  if (answer === 'n') return false
  return undefined
}

/**
 * Yes/no questions over @clack/prompts. Invalid answers re-prompt without a cap;
 * cancelling (Ctrl-C, closed stdin) is the only way out and aborts the install.
 */
export function createPrompter(): Prompter {
  return {
    async ask(question, defaultYes) {
      const hint = defaultYes ? '[Y/n]' : '[y/N]'
      while (true) {
        const ans = await p.text({ message: `${question} ${hint}`, placeholder: defaultYes ? 'y' : 'n' })
        if (p.isCancel(ans)) throw new WizardAbortedError()
        const parsed = parseAnswer(typeof ans === 'string' ? ans : '', defaultYes)
        if (parsed !== undefined) return parsed
        p.log.warn(INVALID_ANSWER)
      }
    }
  }
}
