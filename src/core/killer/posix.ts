import { KillError } from '../errors'
import type { KillResult } from '../types'
import { errorCode, errorMessage } from '../../utils/exec'
import type { Killer } from './index'

export type SendSignal = (pid: number, signal: NodeJS.Signals) => void

const sendSignal: SendSignal = (pid, signal) => {
  process.kill(pid, signal)
}

/**
 * Sends SIGTERM and returns. Whether the process actually exits shows up on
 * the next scan.
 */
export class PosixKiller implements Killer {
  constructor(private readonly send: SendSignal = sendSignal) {}

  async kill(pid: number): Promise<KillResult> {
    try {
      this.send(pid, 'SIGTERM')
    } catch (err) {
      const code = errorCode(err)
      if (code === 'ESRCH') throw new KillError(pid, 'no-such-process', `process ${pid} no longer exists`)
      if (code === 'EPERM') throw new KillError(pid, 'permission-denied', `not permitted to signal ${pid}`)
      throw new KillError(pid, 'failed', errorMessage(err))
    }
    return { pid, method: 'SIGTERM' }
  }
}
