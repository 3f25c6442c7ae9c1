import { vi } from 'vitest'

import { ExecSpawnError, type Exec, type ExecResult } from '../utils/exec'

/**
 * An `Exec` answering from a table keyed by the full command line,
 * e.g. `ss -H -ltnp`. Commands missing from the table behave as not installed.
 */
export function fakeExec(responses: Record<string, Partial<ExecResult> | Error>) {
  return vi.fn<Exec>(async (cmd, args = []) => {
    const key = [cmd, ...args].join(' ')
    const r = Object.prototype.hasOwnProperty.call(responses, key) ? responses[key] : undefined
    if (r === undefined) throw new ExecSpawnError(`spawn ${cmd} ENOENT`, 'ENOENT')
    if (r instanceof Error) throw r
    return { cmd, args, stdout: '', stderr: '', code: 0, ...r }
  })
}
