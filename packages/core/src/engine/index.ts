/**
 * Engine facade.
 * @packageDocumentation
 */

export { Engine, compile, escapePattern } from './engine'
