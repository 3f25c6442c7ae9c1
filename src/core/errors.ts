import type { KillFailure } from './types'

/** The socket enumeration facility is missing or produced output we cannot read. */
export class ScanError extends Error {
  override name = 'ScanError'
}

export class KillError extends Error {
  override name = 'KillError'

  constructor(
    public readonly pid: number,
    public readonly reason: KillFailure,
    message: string,
  ) {
    super(message)
  }
}
