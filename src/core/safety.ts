import type { ListeningProcess } from './types'
import { platform, type Platform } from '../utils/platform'

export interface Protection {
  protected: boolean
  reason?: string
}

/**
 * Pids that are never signalled. Anything else is left to the OS, which
 * refuses with EPERM or Access denied when the user may not kill it.
 */
export function protectionFor(
  l: Pick<ListeningProcess, 'pid'>,
  p: Platform = platform(),
  selfPid: number = process.pid,
): Protection {
  if (l.pid === selfPid) return { protected: true, reason: 'that is porthold itself' }

  if (p === 'win32') {
    if (l.pid === 0 || l.pid === 4) return { protected: true, reason: 'system process' }
  } else if (l.pid <= 1) {
    return { protected: true, reason: 'pid 1 (system init)' }
  }

  return { protected: false }
}
