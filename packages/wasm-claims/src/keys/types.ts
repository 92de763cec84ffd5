/**
 * Key pair types.
 */

/**
 * Role of a signing identity. Accounts issue tokens; modules are the
 * subjects those tokens describe.
 */
export type KeyKind = 'account' | 'module'
