import type { ListeningProcess } from '../types'
import { errorMessage, isCommandNotFound, type Exec, type ExecResult } from '../../utils/exec'
import { uniqBy } from '../../utils/strings'

export type ToolOutput = { ok: true; stdout: string } | { ok: false; reason: string }

export type ToolListing = { ok: true; records: ListeningProcess[] } | { ok: false; reason: string }

const TOOL_TIMEOUT_MS = 5000

/**
 * Run an enumeration tool and decide whether its output is usable.
 *
 * Non-empty stdout is always used: unprivileged runs print warnings and exit
 * non-zero while still listing the caller's own sockets. lsof exits 1 with no
 * output at all when nothing matches.
 */
export async function runTool(run: Exec, cmd: string, args: string[], signal?: AbortSignal): Promise<ToolOutput> {
  signal?.throwIfAborted()

  let res: ExecResult
  try {
    res = await run(cmd, args, signal ? { timeoutMs: TOOL_TIMEOUT_MS, signal } : { timeoutMs: TOOL_TIMEOUT_MS })
  } catch (err) {
    // Cancelled scans end here, not in a fallback.
    if (signal?.aborted) throw err
    if (isCommandNotFound(err)) return { ok: false, reason: `${cmd} not found` }
    return { ok: false, reason: `${cmd}: ${errorMessage(err)}` }
  }

  if (res.code === 0 || res.stdout.trim()) return { ok: true, stdout: res.stdout }
  if (res.code === 1 && !res.stderr.trim()) return { ok: true, stdout: '' }

  const detail = res.stderr.trim().split(/\r?\n/)[0] || `exit code ${res.code ?? 'unknown'}`
  return { ok: false, reason: `${cmd} failed: ${detail}` }
}

/**
 * Split `host:port` as printed by ss, lsof and netstat.
 * Examples: 0.0.0.0:3000, *:5173, [::]:22, 127.0.0.53%lo:53
 */
export function parseAddrPort(token: string): { port: number | null; address?: string } {
  const m = token.match(/^(.*):(\d+)$/)
  if (!m) return { port: null }

  const port = Number(m[2])
  if (!Number.isInteger(port) || port > 65535) return { port: null }

  const address = (m[1] ?? '').replace(/^\[|\]$/g, '')
  return { port, address: address || undefined }
}

export function compareListening(a: ListeningProcess, b: ListeningProcess): number {
  return a.port - b.port || a.protocol.localeCompare(b.protocol) || a.pid - b.pid
}

/** Dedupe (tools repeat IPv4/IPv6 and per-fd rows) and order by port. */
export function finalize(records: readonly ListeningProcess[]): ListeningProcess[] {
  const unique = uniqBy(records, (l) => `${l.protocol}:${l.port}:${l.pid}:${l.address ?? ''}`)
  return unique.sort(compareListening)
}
