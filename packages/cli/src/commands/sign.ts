import { parseArgs } from 'node:util'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { KeyPair, loadConfig, signBufferWithClaims } from 'wasm-claims'
import { loadKeyPair } from '../keys.js'
import { formatError, formatRows } from '../output.js'
import type { SignCommandOptions } from '../types.js'

const USAGE =
  'Usage: wasm-claims sign <input> <output> --issuer <seed|file> [--subject <seed|file>]\n' +
  '         [--cap <id>]... [--tag <tag>]... [--expires <days>] [--nbf <days>]\n'

function parseDays(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined
  }
  if (!/^\d+$/.test(value)) {
    throw new Error(`${flag} must be a non-negative whole number of days`)
  }
  return Number(value)
}

function parseSignArgs(args: string[]): SignCommandOptions | string {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      issuer: { type: 'string' },
      subject: { type: 'string' },
      cap: { type: 'string', multiple: true },
      tag: { type: 'string', multiple: true },
      expires: { type: 'string' },
      nbf: { type: 'string' },
    },
    strict: true,
  })

  const [input, output] = positionals
  if (input === undefined || output === undefined) {
    return 'Error: <input> and <output> are required'
  }
  if (values.issuer === undefined) {
    return 'Error: --issuer is required'
  }

  return {
    input,
    output,
    issuer: values.issuer,
    subject: values.subject,
    caps: values.cap ?? [],
    tags: values.tag ?? [],
    expiresInDays: parseDays(values.expires, '--expires'),
    notBeforeDays: parseDays(values.nbf, '--nbf'),
  }
}

export async function signCommand(args: string[]): Promise<number> {
  try {
    const options = parseSignArgs(args)
    if (typeof options === 'string') {
      process.stderr.write(`${options}\n`)
      process.stderr.write(USAGE)
      return 1
    }

    const config = await loadConfig()
    const accountKey = await loadKeyPair(options.issuer)
    const moduleKey =
      options.subject === undefined
        ? KeyPair.generate('module')
        : await loadKeyPair(options.subject)

    const bytes = await fs.readFile(options.input)
    const signed = await signBufferWithClaims(new Uint8Array(bytes), {
      accountKey,
      moduleKey,
      caps: options.caps,
      tags: options.tags,
      expiresInDays: options.expiresInDays ?? config.defaults.expiresInDays,
      notBeforeDays: options.notBeforeDays ?? config.defaults.notBeforeDays,
    })
    await fs.writeFile(options.output, signed)

    process.stdout.write(`Signed module written to ${path.resolve(options.output)}\n`)
    const rows: [string, string][] = [['Module', moduleKey.publicKey()]]
    if (options.subject === undefined) {
      rows.push(['Module Seed', moduleKey.seed()])
    }
    process.stdout.write(formatRows(rows))
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
