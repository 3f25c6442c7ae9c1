const ANSI_PATTERN =
  // eslint-disable-next-line no-control-regex
  /[\u001B\u009B][[\]()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g

export function stripAnsi(input: string): string {
  return input.replace(ANSI_PATTERN, '')
}

export function stringWidth(input: string): number {
  // Code points, not terminal cells. Everything we draw is ports, pids and process names.
  return Array.from(stripAnsi(input)).length
}

export function padRight(input: string, width: number): string {
  const w = stringWidth(input)
  if (w >= width) return input
  return input + ' '.repeat(width - w)
}

export function truncate(input: string, width: number): string {
  if (width <= 0) return ''
  const s = stripAnsi(input)
  if (stringWidth(s) <= width) return s
  return Array.from(s).slice(0, Math.max(0, width - 1)).join('') + '…'
}

export function uniqBy<T>(items: readonly T[], key: (t: T) => string): T[] {
  const seen = new Set<string>()
  const out: T[] = []
  for (const it of items) {
    const k = key(it)
    if (seen.has(k)) continue
    seen.add(k)
    out.push(it)
  }
  return out
}

export function maxLen(values: readonly string[]): number {
  return values.reduce((m, v) => Math.max(m, stringWidth(v)), 0)
}

export function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`
}
