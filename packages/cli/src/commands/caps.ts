import { capabilityName, knownCapabilities } from 'wasm-claims'
import { formatRows } from '../output.js'

export function capsCommand(_args: string[]): number {
  process.stdout.write(
    formatRows(knownCapabilities().map((id) => [id, capabilityName(id)] as const)),
  )
  return 0
}
