import { parseArgs } from 'node:util'
import * as fs from 'node:fs/promises'
import { capabilityName, extractClaims, validateToken } from 'wasm-claims'
import type { Token, TokenValidation } from 'wasm-claims'
import { dim, formatError, formatRows } from '../output.js'

function listOrNone(items: string[] | undefined): string {
  return items === undefined || items.length === 0 ? 'None' : items.join(', ')
}

function describeToken(token: Token, validation: TokenValidation): string {
  const { claims } = token
  return formatRows([
    ['Module', claims.subject],
    ['Account', claims.issuer],
    ['Token ID', claims.id],
    ['Expires', validation.expiresHuman],
    ['Can Be Used', validation.notBeforeHuman],
    ['Capabilities', listOrNone(claims.caps?.map(capabilityName))],
    ['Tags', listOrNone(claims.tags)],
    ['Module Hash', claims.moduleHash],
  ])
}

export async function inspectCommand(args: string[]): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        raw: { type: 'boolean', default: false },
      },
      strict: true,
    })

    const file = positionals[0]
    if (file === undefined) {
      process.stderr.write('Error: <file> is required\n')
      process.stderr.write('Usage: wasm-claims inspect <file> [--raw]\n')
      return 1
    }

    const bytes = await fs.readFile(file)
    const token = await extractClaims(new Uint8Array(bytes))
    if (token === undefined) {
      process.stdout.write(`No embedded claims found in ${file}\n`)
      return 0
    }

    if (values.raw) {
      process.stdout.write(`${token.jwt}\n`)
      return 0
    }

    const validation = await validateToken(token.jwt)
    process.stdout.write(describeToken(token, validation))

    if (validation.expired) {
      process.stdout.write(dim('Warning: this token has expired.\n'))
    }
    if (validation.cannotUseYet) {
      process.stdout.write(dim('Warning: this token is not valid yet.\n'))
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
