import type { MatchResult } from './result'

// strings (one-character elements), token arrays and byte buffers all qualify
export type Input<E> = ArrayLike<E>

export abstract class Rule<E> {
	abstract match(input: Input<E>, begin: number, end: number): MatchResult

	run(input: Input<E>, begin = 0, end = input.length): MatchResult {
		return this.match(input, begin, end)
	}
}
