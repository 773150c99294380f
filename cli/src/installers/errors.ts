export type InstallerErrorKind =
  | 'environment'
  | 'unsupported-platform'
  | 'version'
  | 'command'
  | 'clean-declined'
  | 'wizard-aborted'
  | 'usage'

// Every InstallerError is fatal: citty's runMain prints it on stderr and exits 1.
export class InstallerError extends Error {
  constructor(readonly kind: InstallerErrorKind, message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class EnvironmentError extends InstallerError {
  constructor(message: string) {
    super('environment', message)
  }
}

export class UnsupportedPlatformError extends InstallerError {
  constructor(tried: readonly string[]) {
    super('unsupported-platform', `No supported package manager found (tried: ${tried.join(', ')})`)
  }
}

export class VersionGateError extends InstallerError {
  constructor(readonly tool: string, readonly installed: string, readonly expected: string) {
    super('version', `${tool} ${installed} does not satisfy ${expected}`)
  }
}

export class CommandError extends InstallerError {
  constructor(readonly command: string, readonly exitCode: number | null) {
    super('command', `Command failed (${exitCode}): ${command}`)
  }
}

export class CleanDeclinedError extends InstallerError {
  constructor() {
    super('clean-declined', 'Clean aborted; nothing was removed')
  }
}

export class WizardAbortedError extends InstallerError {
  constructor() {
    super('wizard-aborted', 'Install aborted')
  }
}

export class UsageError extends InstallerError {
  constructor(message: string) {
    super('usage', message)
  }
}
