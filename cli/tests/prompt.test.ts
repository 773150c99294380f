import { describe, it, expect, vi, beforeEach } from 'vitest'

vi.mock('@clack/prompts', () => ({
  text: vi.fn(),
  isCancel: (v: unknown) => typeof v === 'symbol',
  log: { warn: vi.fn(), info: vi.fn(), message: vi.fn(), success: vi.fn(), error: vi.fn() }
}))

import * as p from '@clack/prompts'
import { createPrompter, INVALID_ANSWER, parseAnswer } from '../src/installers/prompt.js'
import { WizardAbortedError } from '../src/installers/errors.js'

const text = vi.mocked(p.text)

beforeEach(() => {
  vi.clearAllMocks()
  text.mockReset()
})

describe('parseAnswer', () => {
  it('accepts y and n in any case', () => {
    expect(parseAnswer('Y', false)).toBe(true)
    expect(parseAnswer(' n ', true)).toBe(false)
  })

  it('uses the default for empty input', () => {
    expect(parseAnswer('', true)).toBe(true)
    expect(parseAnswer('   ', false)).toBe(false)
  })

  it('rejects anything else', () => {
    expect(parseAnswer('yes', true)).toBeUndefined()
    expect(parseAnswer('1', true)).toBeUndefined()
  })
})

describe('createPrompter', () => {
  it('re-prompts on invalid input until it gets y or n', async () => {
    text.mockResolvedValueOnce('maybe').mockResolvedValueOnce('nope').mockResolvedValueOnce('N')
    await expect(createPrompter().ask('Install Node-RED?', true)).resolves.toBe(false)
    expect(text).toHaveBeenCalledTimes(3)
    expect(p.log.warn).toHaveBeenCalledTimes(2)
    expect(p.log.warn).toHaveBeenCalledWith(INVALID_ANSWER)
  })

  it('shows the default in the question', async () => {
    text.mockResolvedValueOnce('')
    await expect(createPrompter().ask('Fill the build cache?', false)).resolves.toBe(false)
    expect(text).toHaveBeenCalledWith({ message: 'Fill the build cache? [y/N]', placeholder: 'n' })
  })

  it('aborts the install when cancelled', async () => {
    text.mockResolvedValueOnce(Symbol('clack:cancel'))
    await expect(createPrompter().ask('Install nginx?', true)).rejects.toBeInstanceOf(WizardAbortedError)
  })
})
