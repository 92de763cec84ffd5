#!/usr/bin/env node
/**
 * CLI entry point for wasm-claims.
 *
 * Each subcommand is lazy-loaded via dynamic import() so that only the
 * requested command's module (and its dependencies) is loaded.
 *
 * argv layout: [node, script, subcommand, ...commandArgs]
 *
 * @internal
 */

import { parseArgs } from 'node:util'

const { positionals } = parseArgs({
  allowPositionals: true,
  strict: false,
})

const subcommand = positionals[0]
const commandArgs = process.argv.slice(3)

function printHelp(): void {
  process.stdout.write(
    'Usage: wasm-claims <command> [options]\n\n' +
      'Commands:\n' +
      '  keygen    Generate an account or module key pair\n' +
      '  sign      Embed signed claims in a WebAssembly module\n' +
      '  inspect   Show and verify the claims embedded in a module\n' +
      '  caps      List well-known capabilities\n',
  )
}

async function main(): Promise<number> {
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printHelp()
    return 0
  }

  switch (subcommand) {
    case 'keygen': {
      const { keygenCommand } = await import('./commands/keygen.js')
      return keygenCommand(commandArgs)
    }
    case 'sign': {
      const { signCommand } = await import('./commands/sign.js')
      return signCommand(commandArgs)
    }
    case 'inspect': {
      const { inspectCommand } = await import('./commands/inspect.js')
      return inspectCommand(commandArgs)
    }
    case 'caps': {
      const { capsCommand } = await import('./commands/caps.js')
      return capsCommand(commandArgs)
    }
    default:
      process.stderr.write(`Unknown command: ${subcommand}\n`)
      printHelp()
      return 1
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
