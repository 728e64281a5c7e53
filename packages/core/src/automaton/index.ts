/**
 * Read-only automaton tooling.
 * @packageDocumentation
 */

export { automatonToDot, type DotOptions } from './dot'
