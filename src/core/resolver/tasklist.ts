import { execFile, type Exec } from '../../utils/exec'
import type { ProcessResolver } from './index'

/**
 * Resolves names from a single `tasklist /FO CSV /NH` run, taken lazily on
 * first use and kept for the resolver's lifetime.
 */
export class TasklistResolver implements ProcessResolver {
  private table: Promise<Map<number, string>> | undefined

  constructor(private readonly run: Exec = execFile) {}

  async resolve(pid: number): Promise<string> {
    if (!this.table) this.table = this.load()
    return (await this.table).get(pid) ?? ''
  }

  private async load(): Promise<Map<number, string>> {
    try {
      const res = await this.run('tasklist', ['/FO', 'CSV', '/NH'], { timeoutMs: 3000 })
      return parseTasklist(res.stdout)
    } catch {
      return new Map()
    }
  }
}

/** Columns: "Image Name","PID","Session Name","Session#","Mem Usage" */
export function parseTasklist(stdout: string): Map<number, string> {
  const map = new Map<number, string>()

  for (const line of stdout.split(/\r?\n/)) {
    const row = parseCsvLine(line.trim())
    if (row.length < 2) continue

    const pid = Number(row[1])
    if (!Number.isInteger(pid) || pid <= 0) continue
    map.set(pid, row[0] ?? '')
  }

  return map
}

export function parseCsvLine(line: string): string[] {
  const out: string[] = []
  let i = 0

  while (i < line.length) {
    if (line[i] === ',') {
      i++
      continue
    }

    let cur = ''
    if (line[i] === '"') {
      i++
      while (i < line.length) {
        const ch = line[i]
        if (ch === '"') {
          if (line[i + 1] === '"') {
            cur += '"'
            i += 2
            continue
          }
          i++
          break
        }
        cur += ch
        i++
      }
      // skip to the next separator
      while (i < line.length && line[i] !== ',') i++
      out.push(cur)
      continue
    }

    while (i < line.length && line[i] !== ',') {
      cur += line[i]
      i++
    }
    out.push(cur.trim())
  }

  return out
}
