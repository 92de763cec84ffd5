/** Options parsed from the `wasm-claims sign` command line. */
export interface SignCommandOptions {
  /** Path of the module to sign. */
  input: string
  /** Path the signed module is written to. */
  output: string
  /** Account seed, or a path to a file holding it. */
  issuer: string
  /**
   * Module seed, or a path to a file holding it.
   * A fresh module key is generated when omitted.
   */
  subject?: string | undefined
  caps: string[]
  tags: string[]
  expiresInDays?: number | undefined
  notBeforeDays?: number | undefined
}
