import { posix } from 'node:path'

import { execFile, type Exec } from '../../utils/exec'
import type { ProcessResolver } from './index'

export class PsResolver implements ProcessResolver {
  constructor(private readonly run: Exec = execFile) {}

  async resolve(pid: number): Promise<string> {
    try {
      const res = await this.run('ps', ['-p', String(pid), '-o', 'comm='], { timeoutMs: 1000 })
      if (res.code !== 0) return ''
      // macOS prints the full executable path here.
      return posix.basename(res.stdout.trim())
    } catch {
      return ''
    }
  }
}
