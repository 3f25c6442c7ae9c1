import { KillError } from '../errors'
import type { KillResult } from '../types'
import { errorMessage, execFile, type Exec, type ExecResult } from '../../utils/exec'
import type { Killer } from './index'

/**
 * `taskkill /PID n` without /F posts WM_CLOSE, the closest Windows has to SIGTERM.
 */
export class WindowsKiller implements Killer {
  constructor(private readonly run: Exec = execFile) {}

  async kill(pid: number): Promise<KillResult> {
    let res: ExecResult
    try {
      res = await this.run('taskkill', ['/PID', String(pid)], { timeoutMs: 5000 })
    } catch (err) {
      throw new KillError(pid, 'failed', errorMessage(err))
    }

    const out = `${res.stdout}\n${res.stderr}`.trim()

    // English and Chinese locales; anything else falls back to the exit code.
    if (/SUCCESS|成功/i.test(out)) return { pid, method: 'taskkill' }
    if (/not found|找不到/i.test(out)) {
      throw new KillError(pid, 'no-such-process', `process ${pid} no longer exists`)
    }
    if (/Access.+denied|拒绝访问/i.test(out)) {
      throw new KillError(pid, 'permission-denied', `access denied for ${pid}`)
    }
    if (res.code === 0) return { pid, method: 'taskkill' }

    // Strip control and non-ASCII bytes from OEM code page output.
    const clean = out.replace(/[\u0000-\u001F]|[^\x00-\x7F]/g, ' ').replace(/\s+/g, ' ').trim()
    throw new KillError(pid, 'failed', clean || `taskkill exited with code ${res.code ?? 'unknown'}`)
  }
}
