import type { ListeningProcess, Snapshot } from './types'

/**
 * The current snapshot plus a selection index.
 *
 * Selection is positional: after a refresh the index is clamped into the new
 * snapshot, it does not follow the previously selected process. There is no
 * wraparound at either end.
 */
export class ListModel {
  private snapshot: Snapshot = Object.freeze([])
  private index: number | null = null

  get items(): Snapshot {
    return this.snapshot
  }

  /** null when the snapshot is empty */
  get selected(): number | null {
    return this.index
  }

  /** Replace the snapshot wholesale, keeping scan order. */
  refresh(next: readonly ListeningProcess[]): void {
    this.snapshot = Object.freeze([...next])

    if (this.snapshot.length === 0) {
      this.index = null
      return
    }
    this.index = clamp(this.index ?? 0, 0, this.snapshot.length - 1)
  }

  moveSelection(delta: number): void {
    if (this.index === null) return
    this.index = clamp(this.index + delta, 0, this.snapshot.length - 1)
  }

  currentSelection(): ListeningProcess | undefined {
    if (this.index === null) return undefined
    return this.snapshot[this.index]
  }
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n))
}
