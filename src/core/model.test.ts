import { describe, expect, it } from 'vitest'

import { ListModel } from './model'
import type { ListeningProcess } from './types'

const rec = (pid: number, port: number, processName = `p${pid}`): ListeningProcess => ({
  pid,
  port,
  processName,
  protocol: 'tcp',
})

describe('ListModel', () => {
  it('starts empty with no selection', () => {
    const model = new ListModel()
    expect(model.items).toEqual([])
    expect(model.selected).toBeNull()
    expect(model.currentSelection()).toBeUndefined()
  })

  it('selects the first row after the first refresh and keeps scan order', () => {
    const model = new ListModel()
    model.refresh([rec(100, 8080), rec(200, 5432)])

    expect(model.selected).toBe(0)
    expect(model.items.map((l) => l.port)).toEqual([8080, 5432])
    expect(model.currentSelection()?.pid).toBe(100)
  })

  it('does not wrap past the last row', () => {
    const model = new ListModel()
    model.refresh([rec(1, 10), rec(2, 20)])
    model.moveSelection(1)
    expect(model.selected).toBe(1)

    model.moveSelection(1)
    expect(model.selected).toBe(1)
  })

  it('does not wrap before the first row', () => {
    const model = new ListModel()
    model.refresh([rec(1, 10), rec(2, 20)])
    model.moveSelection(-1)
    expect(model.selected).toBe(0)
  })

  it('clamps large deltas', () => {
    const model = new ListModel()
    model.refresh([rec(1, 10), rec(2, 20), rec(3, 30)])
    model.moveSelection(10)
    expect(model.selected).toBe(2)
    model.moveSelection(-10)
    expect(model.selected).toBe(0)
  })

  it('ignores movement on an empty list', () => {
    const model = new ListModel()
    model.refresh([])
    model.moveSelection(1)
    expect(model.selected).toBeNull()
  })

  it('clamps the selection by position when the snapshot shrinks', () => {
    const model = new ListModel()
    model.refresh([rec(1, 10), rec(2, 20), rec(3, 30)])
    model.moveSelection(2)

    model.refresh([rec(1, 10)])
    expect(model.selected).toBe(0)
    expect(model.currentSelection()?.pid).toBe(1)
  })

  it('keeps the index, not the process, when the snapshot changes', () => {
    const model = new ListModel()
    model.refresh([rec(1, 10), rec(2, 20)])
    model.moveSelection(1)

    model.refresh([rec(3, 30), rec(4, 40), rec(5, 50)])
    expect(model.selected).toBe(1)
    expect(model.currentSelection()?.pid).toBe(4)
  })

  it('drops the selection when the snapshot becomes empty and restores it at 0', () => {
    const model = new ListModel()
    model.refresh([rec(1, 10), rec(2, 20)])
    model.moveSelection(1)

    model.refresh([])
    expect(model.selected).toBeNull()

    model.refresh([rec(3, 30), rec(4, 40)])
    expect(model.selected).toBe(0)
  })

  it('keeps the selection within bounds for any snapshot size', () => {
    const model = new ListModel()
    for (const size of [0, 1, 2, 5, 3, 0, 4]) {
      model.refresh(Array.from({ length: size }, (_, i) => rec(i + 1, 1000 + i)))
      model.moveSelection(0)
      if (size === 0) expect(model.selected).toBeNull()
      else {
        expect(model.selected).toBeGreaterThanOrEqual(0)
        expect(model.selected).toBeLessThanOrEqual(size - 1)
      }
      model.moveSelection(3)
    }
  })

  it('stores a frozen copy of the snapshot', () => {
    const model = new ListModel()
    const input = [rec(1, 10)]
    model.refresh(input)
    input.push(rec(2, 20))

    expect(model.items).toHaveLength(1)
    expect(Object.isFrozen(model.items)).toBe(true)
  })
})
