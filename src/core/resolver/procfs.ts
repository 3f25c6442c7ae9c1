import { readFile } from 'node:fs/promises'

import type { ProcessResolver } from './index'

export type ReadText = (path: string) => Promise<string>

export class ProcfsResolver implements ProcessResolver {
  constructor(private readonly read: ReadText = (path) => readFile(path, 'utf8')) {}

  async resolve(pid: number): Promise<string> {
    try {
      return (await this.read(`/proc/${pid}/comm`)).trim()
    } catch {
      // Gone, or another user's process under hidepid.
      return ''
    }
  }
}
