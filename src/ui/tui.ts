import { keyToAction, type Dispatcher } from '../core/dispatcher'
import { ansi, cursorTo, keys, splitKeys } from '../utils/ansi'
import { renderScreen } from './renderer'

export interface TerminalInput {
  isTTY?: boolean
  setRawMode?(mode: boolean): unknown
  resume(): unknown
  pause(): unknown
  on(event: 'data', listener: (data: Buffer) => void): unknown
  removeListener(event: 'data', listener: (data: Buffer) => void): unknown
}

export interface TerminalOutput {
  columns?: number
  rows?: number
  write(chunk: string): unknown
  on?(event: 'resize', listener: () => void): unknown
  removeListener?(event: 'resize', listener: () => void): unknown
}

export interface Terminal {
  input: TerminalInput
  output: TerminalOutput
}

export interface TuiExit {
  code: number
  /** Set when the session ended on an error, e.g. the startup scan failed. */
  error?: unknown
}

/**
 * Run the draw/input loop until quit. The terminal is restored before the
 * returned promise settles, so callers can print to it safely.
 */
export async function runTui(dispatcher: Dispatcher, terminal: Terminal): Promise<TuiExit> {
  const { input, output } = terminal

  let closed = false
  let resolveExit: (exit: TuiExit) => void = () => undefined
  const exited = new Promise<TuiExit>((resolve) => {
    resolveExit = resolve
  })

  const render = () => {
    if (closed) return
    const lines = renderScreen(dispatcher.view(), {
      columns: output.columns || 80,
      rows: output.rows || 24,
    })
    output.write(cursorTo(0, 0) + ansi.clearScreen + lines.join('\n'))
  }

  const restore = () => {
    input.removeListener('data', onData)
    output.removeListener?.('resize', render)
    process.off('SIGINT', onSigInt)
    input.setRawMode?.(false)
    input.pause()
    output.write(ansi.showCursor + ansi.altScreenExit)
  }

  const close = (exit: TuiExit) => {
    if (closed) return
    closed = true
    dispatcher.dispose()
    restore()
    resolveExit(exit)
  }

  const fail = (error: unknown) => close({ code: 1, error })

  // Runs after every dispatch or scan settles.
  const settle = () => {
    if (dispatcher.mode === 'exiting') close({ code: 0 })
    else render()
  }

  const onSigInt = () => close({ code: 130 })

  function onData(data: Buffer): void {
    for (const key of splitKeys(data.toString('utf8'))) {
      if (closed) return
      if (key === keys.ctrlC) {
        close({ code: 130 })
        return
      }

      const action = keyToAction(key, dispatcher.mode)
      if (!action) continue

      const pending = dispatcher.dispatch(action)
      // Draw the busy state (or leave at once on quit) before the work settles.
      settle()
      pending.then(settle, fail)
    }
  }

  output.write(ansi.altScreenEnter + ansi.hideCursor + ansi.clearScreen)
  input.setRawMode?.(true)
  input.resume()
  input.on('data', onData)
  output.on?.('resize', render)
  process.on('SIGINT', onSigInt)

  const loading = dispatcher.load()
  render()
  loading.then(settle, fail)

  return exited
}
