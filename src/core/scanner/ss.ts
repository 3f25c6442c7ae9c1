import type { ListeningProcess, Protocol } from '../types'
import type { Exec } from '../../utils/exec'
import { parseAddrPort, runTool, type ToolListing } from './shared'

const SS_USER = /\("([^"]*)",pid=(\d+)/g

/**
 * Parse `ss -H -l[tu]np` output.
 *
 * Columns: State Recv-Q Send-Q Local:Port Peer:Port Process
 * Rows without a Process column belong to other users and are skipped.
 */
export function parseSs(stdout: string, protocol: Protocol): ListeningProcess[] {
  const lines = stdout.split(/\r?\n/).map((l) => l.trim()).filter(Boolean)
  const out: ListeningProcess[] = []

  for (const line of lines) {
    const parts = line.split(/\s+/)
    if (parts.length < 6) continue

    const { port, address } = parseAddrPort(parts[3] ?? '')
    if (port === null) continue

    // users:(("nginx",pid=10,fd=6),("nginx",pid=11,fd=6)) => one record per process
    const proc = parts.slice(5).join(' ')
    for (const m of proc.matchAll(SS_USER)) {
      const pid = Number(m[2])
      if (!Number.isInteger(pid) || pid <= 0) continue
      out.push({ protocol, port, pid, processName: m[1] ?? '', address })
    }
  }

  return out
}

export async function listWithSs(run: Exec, signal?: AbortSignal): Promise<ToolListing> {
  const tcp = await runTool(run, 'ss', ['-H', '-ltnp'], signal)
  if (!tcp.ok) return tcp

  const udp = await runTool(run, 'ss', ['-H', '-lunp'], signal)
  if (!udp.ok) return udp

  return { ok: true, records: [...parseSs(tcp.stdout, 'tcp'), ...parseSs(udp.stdout, 'udp')] }
}
