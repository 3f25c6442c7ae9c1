import { KillError, ScanError } from './errors'
import type { Killer } from './killer'
import type { ListModel } from './model'
import { protectionFor, type Protection } from './safety'
import type { PortScanner } from './scanner'
import type { KillResult, ListeningProcess, Snapshot } from './types'
import { keys } from '../utils/ansi'
import { elevationHint } from '../utils/platform'
import { plural } from '../utils/strings'

export type Mode = 'viewing' | 'confirming-kill' | 'exiting'

export type Action = 'down' | 'up' | 'kill' | 'refresh' | 'quit' | 'confirm' | 'cancel'

/** Work in flight; input other than quit is ignored meanwhile. */
export type Busy = 'scanning' | 'killing'

export interface Status {
  level: 'info' | 'error'
  text: string
}

/** Everything the renderer needs to draw one frame. */
export interface ScreenView {
  items: Snapshot
  selected: number | null
  mode: Mode
  status: Status | null
  busy: Busy | null
  pending: ListeningProcess | null
}

export interface DispatcherOptions {
  /** Ask y/n before signalling. */
  confirmKill?: boolean
  guard?: (l: ListeningProcess) => Protection
  elevationHint?: string
}

/** Bindings are fixed: j/k or arrows move, x kills, r refreshes, q quits. */
export function keyToAction(key: string, mode: Mode): Action | null {
  if (key === 'q') return 'quit'

  if (mode === 'confirming-kill') {
    if (key === 'y' || key === keys.enter || key === keys.newline) return 'confirm'
    if (key === 'n' || key === keys.esc) return 'cancel'
    return null
  }

  if (mode !== 'viewing') return null

  switch (key) {
    case 'j':
    case keys.down:
      return 'down'
    case 'k':
    case keys.up:
      return 'up'
    case 'x':
      return 'kill'
    case 'r':
      return 'refresh'
    default:
      return null
  }
}

export function describeProcess(l: ListeningProcess): string {
  return l.processName ? `'${l.processName}' (PID ${l.pid})` : `PID ${l.pid}`
}

export class Dispatcher {
  private state: Mode = 'viewing'
  private message: Status | null = null
  private work: Busy | null = null
  private target: ListeningProcess | null = null
  private readonly aborter = new AbortController()

  constructor(
    readonly model: ListModel,
    private readonly scanner: PortScanner,
    private readonly killer: Killer,
    private readonly options: DispatcherOptions = {},
  ) {}

  get mode(): Mode {
    return this.state
  }

  get status(): Status | null {
    return this.message
  }

  get busy(): Busy | null {
    return this.work
  }

  view(): ScreenView {
    return {
      items: this.model.items,
      selected: this.model.selected,
      mode: this.state,
      status: this.message,
      busy: this.work,
      pending: this.target,
    }
  }

  /** Startup scan. Unlike a refresh, a ScanError here reaches the caller. */
  async load(): Promise<void> {
    this.work = 'scanning'
    try {
      const snapshot = await this.scanner.scan(this.aborter.signal)
      this.model.refresh(snapshot)
      this.message = summary(snapshot.length)
    } finally {
      this.work = null
    }
  }

  /** Stops any listing tool still running. The dispatcher is done after this. */
  dispose(): void {
    this.aborter.abort()
  }

  async dispatch(action: Action): Promise<void> {
    if (action === 'quit') {
      this.state = 'exiting'
      this.target = null
      return
    }
    if (this.state === 'exiting' || this.work) return

    if (this.state === 'confirming-kill') {
      if (action === 'confirm') return this.confirmKill()
      if (action === 'cancel') return this.cancelKill()
      return
    }

    switch (action) {
      case 'down':
        return this.navigate(1)
      case 'up':
        return this.navigate(-1)
      case 'refresh':
        return this.refresh(true)
      case 'kill':
        return this.requestKill()
      default:
        return
    }
  }

  private navigate(delta: number): void {
    this.model.moveSelection(delta)
    if (this.message?.level === 'error') this.message = null
  }

  private async refresh(announce: boolean): Promise<void> {
    this.work = 'scanning'
    try {
      const snapshot = await this.scanner.scan(this.aborter.signal)
      this.model.refresh(snapshot)
      if (announce) this.message = summary(snapshot.length)
    } catch (err) {
      if (!(err instanceof ScanError)) throw err
      // Keep the previous snapshot on screen.
      this.message = { level: 'error', text: `Refresh failed: ${err.message}` }
    } finally {
      this.work = null
    }
  }

  private async requestKill(): Promise<void> {
    const target = this.model.currentSelection()
    if (!target) {
      this.message = { level: 'info', text: 'No process selected' }
      return
    }

    if (this.options.confirmKill) {
      this.target = target
      this.state = 'confirming-kill'
      return
    }

    await this.kill(target)
  }

  private async confirmKill(): Promise<void> {
    const target = this.target
    this.target = null
    this.state = 'viewing'
    if (target) await this.kill(target)
  }

  private cancelKill(): void {
    this.target = null
    this.state = 'viewing'
    this.message = { level: 'info', text: 'Kill cancelled' }
  }

  private async kill(target: ListeningProcess): Promise<void> {
    const guard = (this.options.guard ?? protectionFor)(target)
    if (guard.protected) {
      this.reportKillFailure(target, new KillError(target.pid, 'protected', guard.reason ?? 'protected'))
      return
    }

    this.work = 'killing'
    let result: KillResult
    try {
      result = await this.killer.kill(target.pid)
    } catch (err) {
      if (!(err instanceof KillError)) throw err
      this.reportKillFailure(target, err)
      return
    } finally {
      this.work = null
    }

    this.message = { level: 'info', text: `Signalled ${describeProcess(target)} with ${result.method}` }
    await this.refresh(false)
  }

  private reportKillFailure(target: ListeningProcess, err: KillError): void {
    const hint = this.options.elevationHint ?? elevationHint()
    this.message = { level: 'error', text: killFailureText(target, err, hint) }
  }
}

function killFailureText(target: ListeningProcess, err: KillError, hint: string): string {
  const who = describeProcess(target)
  switch (err.reason) {
    case 'no-such-process':
      return `Process ${target.pid} no longer exists`
    case 'permission-denied':
      return `Permission denied: cannot kill ${who}. ${hint}`
    case 'protected':
      return `Refused to kill ${who}: ${err.message}`
    case 'failed':
      return `Failed to kill ${who}: ${err.message}`
  }
}

function summary(count: number): Status {
  if (count === 0) {
    return { level: 'info', text: 'No listening sockets found (elevated privileges may reveal more)' }
  }
  return { level: 'info', text: `Found ${plural(count, 'listening socket')}` }
}
