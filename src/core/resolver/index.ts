import type { ListeningProcess } from '../types'

/**
 * Looks up a display name for a pid the enumeration tool did not name.
 * Never rejects: the process may have exited since the scan, and that must
 * not abort the scan. Unknown names come back as ''.
 */
export interface ProcessResolver {
  resolve(pid: number): Promise<string>
}

/** Fill in missing names, resolving each distinct pid once. */
export async function resolveNames(
  records: readonly ListeningProcess[],
  resolver: ProcessResolver,
): Promise<ListeningProcess[]> {
  const missing = [...new Set(records.filter((r) => !r.processName).map((r) => r.pid))]
  if (missing.length === 0) return [...records]

  const names = new Map(
    await Promise.all(missing.map(async (pid) => [pid, await resolver.resolve(pid)] as const)),
  )

  return records.map((r) => (r.processName ? r : { ...r, processName: names.get(r.pid) ?? '' }))
}
