import { Maybe, None } from '@ts-std/monads'

import { Rule } from './rule'
import type { Input } from './rule'
import type { BinaryLayout } from './binary'
import { succeed, fail, make_result } from './result'
import type { MatchResult } from './result'
import { is_alpha, is_alnum } from './predicates'
import type { Predicate, CharLike } from './predicates'
import { RuleContractError, check_count, bound_limit } from './utils'
import type { Ref } from './utils'

export type Decision = boolean | (() => boolean)
export type Equals<E> = (element: E, target: E) => boolean

function strict_equals<E>(element: E, target: E) {
	return element === target
}

export class Empty<E> extends Rule<E> {
	match(_input: Input<E>, begin: number): MatchResult {
		return succeed(begin, begin)
	}
}

// evaluated on every attempt, which lets a grammar embed semantic checks
export class Bool<E> extends Rule<E> {
	constructor(readonly decision: Decision) { super() }

	match(_input: Input<E>, begin: number): MatchResult {
		const decided = typeof this.decision === 'boolean'
			? this.decision
			: this.decision()
		return make_result(decided, begin, begin)
	}
}

export class Element<E> extends Rule<E> {
	constructor(
		readonly target: E,
		readonly equals: Equals<E> = strict_equals,
	) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		return make_result(begin < end && this.equals(input[begin], this.target), begin + 1, begin)
	}
}

export class AnyElement<E> extends Rule<E> {
	match(_input: Input<E>, begin: number, end: number): MatchResult {
		return make_result(begin < end, begin + 1, begin)
	}
}

export class BytePattern extends Rule<number> {
	readonly bytes: readonly number[]
	constructor(bytes: ArrayLike<number>) {
		super()
		this.bytes = Array.from(bytes)
	}

	match(input: Input<number>, begin: number, end: number): MatchResult {
		const width = this.bytes.length
		if (end - begin < width)
			return fail(begin)

		for (let index = 0; index < width; index++)
			if (input[begin + index] !== this.bytes[index])
				return fail(begin)

		return succeed(begin + width, begin)
	}
}

// the pattern is read through the ref on every attempt,
// so whoever owns the ref may change it between matches
export class Str<E> extends Rule<E> {
	constructor(
		readonly source: Readonly<Ref<ArrayLike<E>>>,
		readonly equals: Equals<E> = strict_equals,
	) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		const pattern = this.source.value
		if (pattern.length === 0)
			return succeed(begin, begin)
		if (end - begin < pattern.length)
			return fail(begin)

		for (let index = 0; index < pattern.length; index++)
			if (!this.equals(input[begin + index], pattern[index]))
				return fail(begin)

		return succeed(begin + pattern.length, begin)
	}
}

export class Pred<E> extends Rule<E> {
	constructor(readonly predicate: Predicate<E>) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		return make_result(begin < end && this.predicate(input[begin]), begin + 1, begin)
	}
}

export class PredRun<E> extends Rule<E> {
	protected readonly limit: number
	constructor(
		readonly predicate: Predicate<E>,
		readonly min: number,
		readonly max: Maybe<number>,
	) {
		super()
		check_count('minimum run length', min)
		this.limit = bound_limit(min, max)
	}

	match(input: Input<E>, begin: number, end: number): MatchResult {
		let position = begin
		while (position < end && position - begin < this.limit && this.predicate(input[position]))
			position++

		return make_result(position - begin >= this.min, position, begin)
	}
}

// a read that would run past the end writes nothing
export class Read<T> extends Rule<number> {
	constructor(
		readonly layout: BinaryLayout<T>,
		readonly destination: Ref<T>,
	) { super() }

	match(input: Input<number>, begin: number, end: number): MatchResult {
		const { width } = this.layout
		if (end - begin < width)
			return fail(begin)

		this.destination.value = this.layout.decode(input, begin)
		return succeed(begin + width, begin)
	}
}

// slots filled before a failing read keep their new values
export class ReadArray<T> extends Rule<number> {
	constructor(
		readonly layout: BinaryLayout<T>,
		readonly destination: T[],
		readonly count: number,
	) {
		super()
		check_count('array count', count)
	}

	match(input: Input<number>, begin: number, end: number): MatchResult {
		const { width } = this.layout
		let position = begin
		for (let index = 0; index < this.count; index++) {
			if (end - position < width)
				return fail(begin)
			this.destination[index] = this.layout.decode(input, position)
			position += width
		}

		return succeed(position, begin)
	}
}

export class ReadSequence<T> extends Rule<number> {
	protected readonly limit: number
	constructor(
		readonly layout: BinaryLayout<T>,
		readonly destination: T[],
		readonly min: number,
		readonly max: Maybe<number>,
	) {
		super()
		check_count('minimum sequence length', min)
		this.limit = bound_limit(min, max)
	}

	match(input: Input<number>, begin: number, end: number): MatchResult {
		const { width } = this.layout
		this.destination.length = 0

		let position = begin
		while (this.destination.length < this.limit && end - position >= width) {
			this.destination.push(this.layout.decode(input, position))
			position += width
		}

		return make_result(this.destination.length >= this.min, position, begin)
	}
}

export class Identifier<E extends CharLike> extends Rule<E> {
	protected readonly head = new Pred<E>(is_alpha)
	protected readonly tail = new PredRun<E>(is_alnum, 0, None)

	match(input: Input<E>, begin: number, end: number): MatchResult {
		const head = this.head.match(input, begin, end)
		if (!head.matched)
			return fail(begin)

		const tail = this.tail.match(input, head.position, end)
		return succeed(tail.position, begin)
	}
}

export class End<E> extends Rule<E> {
	match(_input: Input<E>, begin: number, end: number): MatchResult {
		return make_result(begin === end, begin, begin)
	}
}

export type Offset = number | (() => number)

export class Advance<E> extends Rule<E> {
	constructor(readonly offset: Offset) {
		super()
		if (typeof offset === 'number')
			check_count('advance offset', offset)
	}

	match(_input: Input<E>, begin: number, end: number): MatchResult {
		const offset = typeof this.offset === 'number'
			? this.offset
			: check_count('advance offset', this.offset())

		return make_result(end - begin >= offset, begin + offset, begin)
	}
}


export function empty<E = unknown>(): Rule<E> {
	return new Empty<E>()
}

export function bool<E = unknown>(decision: Decision): Rule<E> {
	return new Bool<E>(decision)
}

export function char(target: string): Rule<string> {
	if (target.length !== 1)
		throw new RuleContractError([`char expects a single character, got:`, target])
	return new Element(target)
}

export function token<T>(target: T, equals?: Equals<T>): Rule<T> {
	return new Element(target, equals)
}

export function any_element<E = unknown>(): Rule<E> {
	return new AnyElement<E>()
}

export function bin<T>(layout: BinaryLayout<T>, value: T): Rule<number> {
	return new BytePattern(layout.encode(value))
}

export function bin_bytes(bytes: ArrayLike<number>): Rule<number> {
	return new BytePattern(bytes)
}

// copied by index, so a string pattern keeps its utf-16 units
export function str(pattern: string): Rule<string>
export function str<E>(pattern: ArrayLike<E>, equals?: Equals<E>): Rule<E>
export function str<E>(pattern: ArrayLike<E>, equals?: Equals<E>): Rule<E> {
	const owned = Array.from({ length: pattern.length }, (_, index) => pattern[index])
	return new Str<E>({ value: owned }, equals)
}

export function str_ref(source: Readonly<Ref<string>>): Rule<string>
export function str_ref<E>(source: Readonly<Ref<ArrayLike<E>>>, equals?: Equals<E>): Rule<E>
export function str_ref<E>(source: Readonly<Ref<ArrayLike<E>>>, equals?: Equals<E>): Rule<E> {
	return new Str<E>(source, equals)
}

export function pred<E>(predicate: Predicate<E>): Rule<E> {
	return new Pred(predicate)
}

export function pred_run<E>(predicate: Predicate<E>, min = 0, max?: number): Rule<E> {
	return new PredRun(predicate, min, Maybe.from_nillable(max))
}

export function read<T>(layout: BinaryLayout<T>, destination: Ref<T>): Rule<number> {
	return new Read(layout, destination)
}

export function read_array<T>(layout: BinaryLayout<T>, destination: T[], count = destination.length): Rule<number> {
	return new ReadArray(layout, destination, count)
}

export function read_sequence<T>(layout: BinaryLayout<T>, destination: T[], min = 0, max?: number): Rule<number> {
	return new ReadSequence(layout, destination, min, Maybe.from_nillable(max))
}

export function ident<E extends CharLike = string>(): Rule<E> {
	return new Identifier<E>()
}

export function end<E = unknown>(): Rule<E> {
	return new End<E>()
}

export function advance<E = unknown>(offset: Offset): Rule<E> {
	return new Advance<E>(offset)
}
