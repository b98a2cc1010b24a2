import { Maybe } from '@ts-std/monads'

import { Rule } from './rule'
import type { Input } from './rule'
import { succeed, fail, make_result } from './result'
import type { MatchResult } from './result'
import { RuleContractError, check_count, bound_limit } from './utils'
import type { NonEmpty } from './utils'

export class Sequence<E> extends Rule<E> {
	readonly rules: readonly Rule<E>[]
	constructor(rules: NonEmpty<Rule<E>>) {
		super()
		this.rules = rules.slice()
	}

	match(input: Input<E>, begin: number, end: number): MatchResult {
		let position = begin
		for (const rule of this.rules) {
			const result = rule.match(input, position, end)
			if (!result.matched)
				return fail(begin)
			position = result.position
		}

		return succeed(position, begin)
	}
}

// ordered choice, the first alternative to match wins and the rest are never attempted
export class Choice<E> extends Rule<E> {
	readonly rules: readonly Rule<E>[]
	constructor(rules: NonEmpty<Rule<E>>) {
		super()
		this.rules = rules.slice()
	}

	match(input: Input<E>, begin: number, end: number): MatchResult {
		for (const rule of this.rules) {
			const result = rule.match(input, begin, end)
			if (result.matched)
				return succeed(result.position, begin)
		}

		return fail(begin)
	}
}

export class Not<E> extends Rule<E> {
	constructor(readonly rule: Rule<E>) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		const result = this.rule.match(input, begin, end)
		return make_result(!result.matched, begin, begin)
	}
}

export class Optional<E> extends Rule<E> {
	constructor(readonly rule: Rule<E>) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		const result = this.rule.match(input, begin, end)
		return succeed(result.matched ? result.position : begin, begin)
	}
}

export class Xor<E> extends Rule<E> {
	constructor(readonly left: Rule<E>, readonly right: Rule<E>) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		const left = this.left.match(input, begin, end)
		const right = this.right.match(input, begin, end)
		if (left.matched === right.matched)
			return fail(begin)

		return succeed(left.matched ? left.position : right.position, begin)
	}
}

// a separator is only consumed when a repetition follows it.
// an iteration that consumes nothing is counted once and then ends the loop,
// otherwise something like many(opt(r)) would never terminate
export class Repeat<E> extends Rule<E> {
	protected readonly limit: number
	constructor(
		readonly rule: Rule<E>,
		readonly separator: Rule<E> | undefined,
		readonly min: number,
		readonly max: Maybe<number>,
	) {
		super()
		check_count('minimum occurrence', min)
		this.limit = bound_limit(min, max)
	}

	match(input: Input<E>, begin: number, end: number): MatchResult {
		let position = begin
		let count = 0

		while (count < this.limit) {
			let cursor = position
			if (count > 0 && this.separator !== undefined) {
				const separator = this.separator.match(input, position, end)
				if (!separator.matched)
					break
				cursor = separator.position
			}

			const result = this.rule.match(input, cursor, end)
			if (!result.matched)
				break

			count++
			const advanced = result.position !== position
			position = result.position
			if (!advanced)
				break
		}

		return make_result(count >= this.min, position, begin)
	}
}

// the skipped prefix counts as consumed, the result spans from the start to the end of the found match
export class Find<E> extends Rule<E> {
	constructor(readonly rule: Rule<E>) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		for (let position = begin; position <= end; position++) {
			const result = this.rule.match(input, position, end)
			if (result.matched)
				return succeed(result.position, begin)
		}

		return fail(begin)
	}
}

export class Select<E> extends Rule<E> {
	constructor(
		readonly discriminator: Rule<E>,
		readonly consequent: Rule<E>,
		readonly otherwise: Rule<E>,
	) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		const decided = this.discriminator.match(input, begin, end)
		const result = decided.matched
			? this.consequent.match(input, decided.position, end)
			: this.otherwise.match(input, begin, end)

		return make_result(result.matched, result.position, begin)
	}
}

export class Test<E> extends Rule<E> {
	constructor(readonly rule: Rule<E>) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		const result = this.rule.match(input, begin, end)
		return make_result(result.matched, begin, begin)
	}
}

export type Failure<E> = Readonly<{
	input: Input<E>,
	position: number,
	end: number,
}>
// returning a position resumes matching there as a success
export type FailureHandler<E> = (failure: Failure<E>) => number | void

export class OnFail<E> extends Rule<E> {
	constructor(
		readonly rule: Rule<E>,
		readonly handler: FailureHandler<E>,
	) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		const result = this.rule.match(input, begin, end)
		if (result.matched)
			return succeed(result.position, begin)

		const resume = this.handler({ input, position: begin, end })
		if (typeof resume !== 'number')
			return fail(begin)

		if (!Number.isInteger(resume) || resume < begin || resume > end)
			throw new RuleContractError([`failure handler resumed at ${resume}, outside of [${begin}, ${end}]`])
		return succeed(resume, begin)
	}
}


export function and<E>(left: Rule<E>, right: Rule<E>): Rule<E> {
	return new Sequence<E>([left, right])
}

export function seq<E>(...rules: NonEmpty<Rule<E>>): Rule<E> {
	return rules.length === 1 ? rules[0] : new Sequence(rules)
}

export function or<E>(left: Rule<E>, right: Rule<E>): Rule<E> {
	return new Choice<E>([left, right])
}

export function alt<E>(...rules: NonEmpty<Rule<E>>): Rule<E> {
	return rules.length === 1 ? rules[0] : new Choice(rules)
}

export function not<E>(rule: Rule<E>): Rule<E> {
	return new Not(rule)
}

export function opt<E>(rule: Rule<E>): Rule<E> {
	return new Optional(rule)
}

export function xor<E>(left: Rule<E>, right: Rule<E>): Rule<E> {
	return new Xor(left, right)
}

export function many<E>(rule: Rule<E>, min = 0, max?: number): Rule<E> {
	return new Repeat(rule, undefined, min, Maybe.from_nillable(max))
}

export function many_sep<E>(rule: Rule<E>, separator: Rule<E>, min = 1, max?: number): Rule<E> {
	return new Repeat(rule, separator, min, Maybe.from_nillable(max))
}

export function star<E>(rule: Rule<E>): Rule<E> {
	return many(rule, 0)
}

export function plus<E>(rule: Rule<E>): Rule<E> {
	return many(rule, 1)
}

export function sep_by<E>(rule: Rule<E>, separator: Rule<E>): Rule<E> {
	return many_sep(rule, separator, 1)
}

export function find<E>(rule: Rule<E>): Rule<E> {
	return new Find(rule)
}

export function select<E>(discriminator: Rule<E>, then: Rule<E>, otherwise: Rule<E>): Rule<E> {
	return new Select(discriminator, then, otherwise)
}

export function test<E>(rule: Rule<E>): Rule<E> {
	return new Test(rule)
}

export function on_fail<E>(rule: Rule<E>, handler: FailureHandler<E>): Rule<E> {
	return new OnFail(rule, handler)
}

// matches left only where right doesn't match
export function diff<E>(left: Rule<E>, right: Rule<E>): Rule<E> {
	return new Sequence<E>([new Not(right), left])
}
