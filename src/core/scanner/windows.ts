import { ScanError } from '../errors'
import type { ProcessResolver } from '../resolver'
import { resolveNames } from '../resolver'
import { TasklistResolver } from '../resolver/tasklist'
import type { ListeningProcess } from '../types'
import { execFile, type Exec } from '../../utils/exec'
import type { PortScanner } from './index'
import { finalize, parseAddrPort, runTool } from './shared'

/**
 * Parse `netstat -ano`.
 *
 *   TCP    0.0.0.0:135    0.0.0.0:0    LISTENING    1234
 *   UDP    [::]:500       *:*                       4444
 */
export function parseNetstat(stdout: string): ListeningProcess[] {
  const out: ListeningProcess[] = []

  for (const raw of stdout.split(/\r?\n/)) {
    const parts = raw.trim().split(/\s+/)
    const proto = (parts[0] ?? '').toLowerCase()

    if (proto === 'tcp') {
      if (parts.length < 5) continue
      if ((parts[3] ?? '').toLowerCase() !== 'listening') continue
    } else if (proto === 'udp') {
      if (parts.length < 4) continue
    } else {
      // headers: "Active Connections", "Proto  Local Address ..."
      continue
    }

    const pid = Number(parts[parts.length - 1])
    // pid 0 is the idle process; nothing owns those sockets.
    if (!Number.isInteger(pid) || pid <= 0) continue

    const { port, address } = parseAddrPort(parts[1] ?? '')
    if (port === null) continue

    out.push({ protocol: proto, port, pid, processName: '', address })
  }

  return out
}

export class WindowsScanner implements PortScanner {
  readonly name = 'netstat'

  constructor(
    private readonly run: Exec = execFile,
    private readonly createResolver: () => ProcessResolver = () => new TasklistResolver(run),
  ) {}

  async scan(signal?: AbortSignal): Promise<ListeningProcess[]> {
    const res = await runTool(this.run, 'netstat', ['-ano'], signal)
    if (!res.ok) throw new ScanError(res.reason)

    // netstat has no names at all; a fresh resolver takes one tasklist snapshot per scan.
    const records = parseNetstat(res.stdout)
    return finalize(await resolveNames(records, this.createResolver()))
  }
}
