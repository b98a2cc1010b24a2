import * as util from 'util'
import type { Maybe } from '@ts-std/monads'

export function debug(obj: unknown, depth = null as number | null) {
	return util.inspect(obj, { depth, colors: true })
}
export function log(obj: unknown, depth = null as number | null) {
	console.log(debug(obj, depth))
}

export class LogError extends Error {
	constructor(lines: unknown[], depth = null as number | null) {
		const message = lines.map(line => {
			return typeof line === 'string'
				? line
				: debug(line, depth)
		}).join('\n')
		super(message)
	}
}

// thrown when a rule is composed or configured in a way it can never match sensibly
// (a malformed grammar), never because of the input being matched
export class RuleContractError extends LogError {
	constructor(lines: unknown[]) {
		super(lines)
		this.name = 'RuleContractError'
	}
}

export type NonEmpty<T> = [T, ...T[]]

export type Ref<T> = { value: T }
export function ref_of<T>(value: T): Ref<T> {
	return { value }
}

export function check_count(what: string, count: number) {
	if (!Number.isInteger(count) || count < 0)
		throw new RuleContractError([`${what} must be a non-negative integer, got:`, count])
	return count
}

export function bound_limit(min: number, max: Maybe<number>) {
	return max.match({
		some: max => {
			check_count('maximum count', max)
			if (max < min)
				throw new RuleContractError([`maximum count ${max} is less than minimum count ${min}`])
			return max
		},
		none: () => Infinity,
	})
}
