import { describe, expect, it } from 'vitest'

import type { ScreenView } from '../core/dispatcher'
import type { ListeningProcess } from '../core/types'
import { stripAnsi } from '../utils/strings'
import { formatRow, columnWidths, renderScreen, scrollTop } from './renderer'

const api: ListeningProcess = { pid: 100, port: 8080, protocol: 'tcp', processName: 'api' }
const postgres: ListeningProcess = { pid: 200, port: 5432, protocol: 'tcp', processName: 'postgres' }

const view = (over: Partial<ScreenView> = {}): ScreenView => ({
  items: [api, postgres],
  selected: 0,
  mode: 'viewing',
  status: { level: 'info', text: 'Found 2 listening sockets' },
  busy: null,
  pending: null,
  ...over,
})

const plain = (lines: string[]) => lines.map(stripAnsi)

describe('renderScreen', () => {
  it('draws title, header, rows, status and key hints', () => {
    expect(plain(renderScreen(view(), { columns: 80, rows: 24 }))).toEqual([
      'porthold · 2 listening',
      '  PORT PROTO PID NAME',
      '> 8080 TCP   100 api',
      '  5432 TCP   200 postgres',
      'i Found 2 listening sockets',
      'j/k move · x kill · r refresh · q quit',
    ])
  })

  it('moves the marker with the selection', () => {
    const lines = plain(renderScreen(view({ selected: 1 }), { columns: 80, rows: 24 }))
    expect(lines[2]).toBe('  8080 TCP   100 api')
    expect(lines[3]).toBe('> 5432 TCP   200 postgres')
  })

  it('cuts rows to the terminal width', () => {
    const lines = plain(renderScreen(view(), { columns: 12, rows: 24 }))
    expect(lines[3]).toBe('  5432 TCP …')
  })

  it('shows errors and the confirmation prompt', () => {
    const lines = plain(
      renderScreen(
        view({
          mode: 'confirming-kill',
          pending: postgres,
          status: { level: 'error', text: 'Process 300 no longer exists' },
        }),
        { columns: 80, rows: 24 },
      ),
    )
    expect(lines.slice(-2)).toEqual([
      'x Process 300 no longer exists',
      "Kill 'postgres' (PID 200) on port 5432? [y] yes [n] no",
    ])
  })

  it('shows the scan in progress on an empty list', () => {
    const lines = plain(renderScreen(view({ items: [], selected: null, status: null, busy: 'scanning' }), { columns: 80, rows: 24 }))
    expect(lines).toEqual([
      'porthold · 0 listening · scanning…',
      '  PORT PROTO PID NAME',
      '  Scanning for listening sockets',
      '',
      'j/k move · x kill · r refresh · q quit',
    ])
  })

  it('scrolls to keep the selection visible', () => {
    const items = [1, 2, 3, 4, 5].map((n) => ({ ...api, pid: n, port: 3000 + n }))
    const lines = plain(renderScreen(view({ items, selected: 4 }), { columns: 80, rows: 6 }))
    expect(lines.slice(2, 4)).toEqual(['  3004 TCP   4   api', '> 3005 TCP   5   api'])
  })
})

describe('formatRow', () => {
  it('labels unresolved names', () => {
    const l: ListeningProcess = { pid: 7, port: 53, protocol: 'udp', processName: '' }
    expect(formatRow(l, columnWidths([l]))).toBe('53   UDP   7   unknown')
  })
})

describe('scrollTop', () => {
  it('keeps the selected row inside the window', () => {
    expect(scrollTop(null, 5, 2)).toBe(0)
    expect(scrollTop(1, 5, 2)).toBe(0)
    expect(scrollTop(2, 5, 2)).toBe(1)
    expect(scrollTop(4, 5, 2)).toBe(3)
    expect(scrollTop(1, 2, 5)).toBe(0)
  })
})
