import { ScanError } from '../errors'
import type { ProcessResolver } from '../resolver'
import { resolveNames } from '../resolver'
import { ProcfsResolver } from '../resolver/procfs'
import type { ListeningProcess } from '../types'
import { execFile, type Exec } from '../../utils/exec'
import type { PortScanner } from './index'
import { listWithLsof } from './lsof'
import { finalize } from './shared'
import { listWithSs } from './ss'

export class LinuxScanner implements PortScanner {
  readonly name = 'ss'

  constructor(
    private readonly run: Exec = execFile,
    private readonly resolver: ProcessResolver = new ProcfsResolver(),
  ) {}

  async scan(signal?: AbortSignal): Promise<ListeningProcess[]> {
    // Prefer `ss` (fast). Without root it often reports no owning processes,
    // so an empty result also sends us to lsof, which may see more.
    const ss = await listWithSs(this.run, signal)
    if (ss.ok && ss.records.length > 0) return this.finish(ss.records)

    const lsof = await listWithLsof(this.run, signal)
    if (lsof.ok) return this.finish(lsof.records)
    if (ss.ok) return this.finish(ss.records)

    throw new ScanError(`no usable socket listing (${ss.reason}; ${lsof.reason})`)
  }

  private async finish(records: ListeningProcess[]): Promise<ListeningProcess[]> {
    return finalize(await resolveNames(records, this.resolver))
  }
}
