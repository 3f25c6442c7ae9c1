import type { KillResult } from '../types'
import { platform, type Platform } from '../../utils/platform'

export interface Killer {
  /** Asks the process to terminate gracefully. Rejects with KillError. */
  kill(pid: number): Promise<KillResult>
}

export async function getKiller(p: Platform = platform()): Promise<Killer> {
  if (p === 'win32') {
    const mod = await import('./windows')
    return new mod.WindowsKiller()
  }
  const mod = await import('./posix')
  return new mod.PosixKiller()
}
