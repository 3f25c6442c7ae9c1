import pc from 'picocolors'

import { parseArgs, resolveProtocols } from './cli/args'
import { printHelp } from './cli/help'
import { Dispatcher } from './core/dispatcher'
import { ScanError } from './core/errors'
import { getKiller } from './core/killer'
import { ListModel } from './core/model'
import { getScanner, withProtocols } from './core/scanner'
import { lineErr, lineInfo } from './ui/renderer'
import { runTui } from './ui/tui'
import { errorMessage } from './utils/exec'
import { elevationHint } from './utils/platform'
import { version } from './version'

async function main(): Promise<void> {
  const { flags, unknown } = parseArgs(process.argv.slice(2))

  if (flags.help) {
    printHelp()
    return
  }

  if (flags.version) {
    process.stdout.write(`${version}\n`)
    return
  }

  if (unknown.length) {
    process.stderr.write(lineErr(`Unknown arguments: ${unknown.join(' ')}`) + '\n')
    process.stderr.write(lineInfo(`Run ${pc.bold('porthold --help')} for usage.`) + '\n')
    process.exitCode = 1
    return
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    process.stderr.write(lineErr('porthold needs an interactive terminal.') + '\n')
    process.exitCode = 1
    return
  }

  const scanner = withProtocols(await getScanner(), resolveProtocols(flags))
  const killer = await getKiller()
  const dispatcher = new Dispatcher(new ListModel(), scanner, killer, { confirmKill: flags.confirm })

  const result = await runTui(dispatcher, { input: process.stdin, output: process.stdout })

  if (result.error !== undefined) {
    if (result.error instanceof ScanError) {
      process.stderr.write(lineErr(`Could not list listening sockets: ${result.error.message}`) + '\n')
      process.stderr.write(lineInfo(elevationHint()) + '\n')
    } else {
      process.stderr.write(lineErr(errorMessage(result.error)) + '\n')
    }
  }

  process.exitCode = result.code
}

main().catch((err: unknown) => {
  process.stderr.write(lineErr(errorMessage(err)) + '\n')
  process.exitCode = 1
})
