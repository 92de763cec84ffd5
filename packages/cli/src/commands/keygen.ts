import { parseArgs } from 'node:util'
import { KeyPair } from 'wasm-claims'
import type { KeyKind } from 'wasm-claims'
import { formatError, formatRows } from '../output.js'

function isKeyKind(value: string): value is KeyKind {
  return value === 'account' || value === 'module'
}

export function keygenCommand(args: string[]): number {
  try {
    const { values } = parseArgs({
      args,
      options: {
        type: { type: 'string', default: 'account' },
      },
      strict: true,
    })

    const kind = values.type
    if (!isKeyKind(kind)) {
      process.stderr.write(`Error: unknown key type "${kind}"\n`)
      process.stderr.write('Usage: wasm-claims keygen [--type account|module]\n')
      return 1
    }

    const keyPair = KeyPair.generate(kind)
    process.stdout.write(
      formatRows([
        ['Public Key', keyPair.publicKey()],
        ['Seed', keyPair.seed()],
      ]),
    )
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
