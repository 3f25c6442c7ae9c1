export type Platform = 'win32' | 'darwin' | 'linux' | 'other'

export function platform(): Platform {
  if (process.platform === 'win32') return 'win32'
  if (process.platform === 'darwin') return 'darwin'
  if (process.platform === 'linux') return 'linux'
  return 'other'
}

/** Hint appended to permission errors, phrased for the host OS. */
export function elevationHint(p: Platform = platform()): string {
  if (p === 'win32') return 'Try an elevated terminal (Run as Administrator).'
  return 'Try: sudo porthold'
}
