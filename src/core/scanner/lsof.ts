import { ScanError } from '../errors'
import type { ProcessResolver } from '../resolver'
import { resolveNames } from '../resolver'
import { PsResolver } from '../resolver/ps'
import type { ListeningProcess, Protocol } from '../types'
import { execFile, type Exec } from '../../utils/exec'
import type { PortScanner } from './index'
import { finalize, parseAddrPort, runTool, type ToolListing } from './shared'

/** lsof escapes unprintable bytes in COMMAND as \xNN. */
function decodeCommand(raw: string): string {
  return raw.replace(/\\x([0-9a-fA-F]{2})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)))
}

/**
 * Parse `lsof -nP -i...` output. Throws ScanError when the header is missing.
 *
 *   COMMAND   PID USER  FD  TYPE DEVICE SIZE/OFF NODE NAME
 *   node    12345 dev  20u IPv4 0x1234      0t0  TCP 127.0.0.1:3000 (LISTEN)
 */
export function parseLsof(stdout: string): ListeningProcess[] {
  const lines = stdout.split(/\r?\n/).filter((l) => l.trim())
  if (lines.length === 0) return []

  const header = lines[0] ?? ''
  if (!/^command\s/i.test(header.trim())) {
    throw new ScanError('unexpected lsof output (missing COMMAND header)')
  }

  const out: ListeningProcess[] = []

  for (const line of lines.slice(1)) {
    const parts = line.trim().split(/\s+/)

    // SIZE/OFF is sometimes blank, so locate the NODE column by value.
    const nodeIdx = parts.findIndex((p, i) => i >= 4 && (p === 'TCP' || p === 'UDP'))
    if (nodeIdx < 0) continue

    const pid = Number(parts[1])
    if (!Number.isInteger(pid) || pid <= 0) continue

    const endpoint = parts[nodeIdx + 1] ?? ''
    // Connected UDP sockets are not listeners.
    if (endpoint.includes('->')) continue

    const { port, address } = parseAddrPort(endpoint)
    if (port === null) continue

    const protocol: Protocol = parts[nodeIdx] === 'TCP' ? 'tcp' : 'udp'

    out.push({
      protocol,
      port,
      pid,
      processName: decodeCommand(parts[0] ?? ''),
      address,
    })
  }

  return out
}

export async function listWithLsof(run: Exec, signal?: AbortSignal): Promise<ToolListing> {
  const tcp = await runTool(run, 'lsof', ['-nP', '-iTCP', '-sTCP:LISTEN'], signal)
  if (!tcp.ok) return tcp

  const udp = await runTool(run, 'lsof', ['-nP', '-iUDP'], signal)
  if (!udp.ok) return udp

  try {
    return { ok: true, records: [...parseLsof(tcp.stdout), ...parseLsof(udp.stdout)] }
  } catch (err) {
    if (!(err instanceof ScanError)) throw err
    return { ok: false, reason: err.message }
  }
}

/** macOS and any other POSIX system: lsof is the only facility we rely on. */
export class LsofScanner implements PortScanner {
  readonly name = 'lsof'

  constructor(
    private readonly run: Exec = execFile,
    private readonly resolver: ProcessResolver = new PsResolver(run),
  ) {}

  async scan(signal?: AbortSignal): Promise<ListeningProcess[]> {
    const res = await listWithLsof(this.run, signal)
    if (!res.ok) throw new ScanError(res.reason)
    return finalize(await resolveNames(res.records, this.resolver))
  }
}
