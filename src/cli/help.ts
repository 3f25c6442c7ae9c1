import pc from 'picocolors'

import { version } from '../version'

export function helpText(): string {
  const dim = pc.dim
  const bold = pc.bold

  const lines = [
    `${bold('porthold')} ${dim(`v${version}`)} · see what is listening, stop it`,
    '',
    `${bold('Usage')}`,
    `  porthold [options]`,
    '',
    `${bold('Options')}`,
    `      --tcp          ${dim('show TCP listeners only')}`,
    `      --udp          ${dim('show UDP listeners only')}`,
    `  -c, --confirm      ${dim('ask before killing')}`,
    `  -h, --help         ${dim('show help')}`,
    `  -v, --version      ${dim('show version')}`,
    '',
    `${bold('Keys')}`,
    `  j / k, arrows      ${dim('move')}`,
    `  x                  ${dim('send SIGTERM to the selected process')}`,
    `  r                  ${dim('refresh')}`,
    `  q                  ${dim('quit')}`,
    '',
    dim('Processes of other users are only visible with elevated privileges (sudo / Administrator).'),
  ]

  return lines.join('\n') + '\n'
}

export function printHelp(): void {
  process.stdout.write(helpText())
}
