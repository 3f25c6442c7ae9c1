import type { ListeningProcess, Protocol } from '../types'
import { platform, type Platform } from '../../utils/platform'

export interface PortScanner {
  /** Facility in use, for status and error messages. */
  readonly name: string
  /**
   * One full snapshot of listening sockets visible to the current user.
   * Aborting `signal` kills the listing tool and rejects.
   */
  scan(signal?: AbortSignal): Promise<ListeningProcess[]>
}

export async function getScanner(p: Platform = platform()): Promise<PortScanner> {
  if (p === 'linux') {
    const mod = await import('./linux')
    return new mod.LinuxScanner()
  }
  if (p === 'win32') {
    const mod = await import('./windows')
    return new mod.WindowsScanner()
  }

  // macOS, and best-effort for other POSIX systems.
  const mod = await import('./lsof')
  return new mod.LsofScanner()
}

export const ALL_PROTOCOLS: readonly Protocol[] = ['tcp', 'udp']

/** Restrict a scanner's snapshots to the given protocols. */
export function withProtocols(scanner: PortScanner, protocols: readonly Protocol[]): PortScanner {
  if (ALL_PROTOCOLS.every((p) => protocols.includes(p))) return scanner

  return {
    name: scanner.name,
    async scan(signal) {
      const records = await scanner.scan(signal)
      return records.filter((l) => protocols.includes(l.protocol))
    },
  }
}
