/**
 * Automaton simulation.
 * @packageDocumentation
 */

export { runAutomaton, epsilonClosure } from './simulator'
