/**
 * Raw value a source reports for a mention that carries no value, such as a
 * flag on the command line. Flag-style actions only look for these.
 */
export const MENTIONED: unique symbol = Symbol("layerconf.mentioned")

/**
 * Default that leaves the item out of the namespace when no source
 * contributes to it. Without it an item that is not found is `null`.
 */
export const SUPPRESS: unique symbol = Symbol("layerconf.suppress")

export type Mentioned = typeof MENTIONED
export type Suppress = typeof SUPPRESS
