import pc from 'picocolors'

import { describeProcess, type ScreenView } from '../core/dispatcher'
import type { ListeningProcess } from '../core/types'
import { maxLen, padRight, truncate } from '../utils/strings'
import { symbols } from '../utils/symbols'

export interface TerminalSize {
  columns: number
  rows: number
}

export interface ColumnWidths {
  port: number
  pid: number
}

/** Title, column header, status and footer. */
const CHROME_LINES = 4

export function columnWidths(items: readonly ListeningProcess[]): ColumnWidths {
  return {
    port: Math.max(4, maxLen(items.map((l) => String(l.port)))),
    pid: Math.max(3, maxLen(items.map((l) => String(l.pid)))),
  }
}

/** `<port> <PROTO> <pid> <name>`, uncoloured. */
export function formatRow(l: ListeningProcess, w: ColumnWidths): string {
  return [
    padRight(String(l.port), w.port),
    padRight(l.protocol.toUpperCase(), 5),
    padRight(String(l.pid), w.pid),
    l.processName || 'unknown',
  ].join(' ')
}

export function formatHeader(w: ColumnWidths): string {
  return ['PORT'.padEnd(w.port), 'PROTO', 'PID'.padEnd(w.pid), 'NAME'].join(' ')
}

/** First visible row, so that the selected row stays on screen. */
export function scrollTop(selected: number | null, count: number, visible: number): number {
  if (selected === null || count <= visible) return 0
  return Math.min(Math.max(0, selected - visible + 1), count - visible)
}

/**
 * Project the dispatcher state onto screen lines. Every line is cut to the
 * terminal width before colour is applied.
 */
export function renderScreen(view: ScreenView, size: TerminalSize): string[] {
  const width = Math.max(10, size.columns)
  const fit = (text: string) => truncate(text, width)
  const lines: string[] = []

  const busy = view.busy ? ` ${symbols.dot} ${view.busy}${symbols.ellipsis}` : ''
  const title = `porthold ${symbols.dot} ${view.items.length} listening${busy}`
  lines.push(pc.bold(fit(title)))

  const w = columnWidths(view.items)
  lines.push(pc.dim(fit(`  ${formatHeader(w)}`)))

  const visible = Math.max(1, size.rows - CHROME_LINES)
  if (view.items.length === 0) {
    const empty = view.busy === 'scanning' ? 'Scanning for listening sockets' : 'No listening sockets'
    lines.push(pc.dim(fit(`  ${empty}`)))
  } else {
    const top = scrollTop(view.selected, view.items.length, visible)
    view.items.slice(top, top + visible).forEach((l, i) => {
      const active = top + i === view.selected
      const row = fit(`${active ? symbols.step : ' '} ${formatRow(l, w)}`)
      lines.push(active ? pc.inverse(pc.bold(row)) : row)
    })
  }

  lines.push(formatStatus(view, fit))
  lines.push(formatFooter(view, fit))
  return lines
}

function formatStatus(view: ScreenView, fit: (text: string) => string): string {
  const status = view.status
  if (!status) return ''
  if (status.level === 'error') return pc.red(fit(`${symbols.err} ${status.text}`))
  return pc.dim(fit(`${symbols.info} ${status.text}`))
}

function formatFooter(view: ScreenView, fit: (text: string) => string): string {
  if (view.mode === 'confirming-kill' && view.pending) {
    const p = view.pending
    return pc.yellow(fit(`Kill ${describeProcess(p)} on port ${p.port}? [y] yes [n] no`))
  }
  return pc.dim(fit(['j/k move', 'x kill', 'r refresh', 'q quit'].join(` ${symbols.dot} `)))
}

export function lineErr(text: string): string {
  return pc.red(`${symbols.err} ${text}`)
}

export function lineInfo(text: string): string {
  return pc.dim(`${symbols.info} ${text}`)
}
