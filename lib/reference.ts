import type { Dict } from '@ts-std/types'

import { Rule } from './rule'
import type { Input } from './rule'
import type { MatchResult } from './result'
import { RuleContractError } from './utils'

// the target is only resolved on the first match, so a rule may refer to itself
// (or to rules declared after it) without nesting itself structurally
export class Lazy<E> extends Rule<E> {
	protected target: Rule<E> | undefined = undefined
	constructor(readonly resolve: () => Rule<E>) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		if (this.target === undefined)
			this.target = this.resolve()
		return this.target.match(input, begin, end)
	}
}

export class Forward<E> extends Rule<E> {
	protected target: Rule<E> | undefined = undefined
	constructor(readonly label = 'forward rule') { super() }

	get is_defined() {
		return this.target !== undefined
	}

	define(rule: Rule<E>) {
		if (this.target !== undefined)
			throw new RuleContractError([`${this.label} has already been defined`])
		this.target = rule
	}

	match(input: Input<E>, begin: number, end: number): MatchResult {
		if (this.target === undefined)
			throw new RuleContractError([`${this.label} was matched before being defined`])
		return this.target.match(input, begin, end)
	}
}

export class Grammar<K extends string, E> {
	protected readonly forwards = new Map<string, Forward<E>>()
	constructor(
		readonly names: readonly K[],
		build: (rule: (name: K) => Rule<E>) => Dict<Rule<E>>,
	) {
		for (const name of names) {
			if (this.forwards.has(name))
				throw new RuleContractError([`grammar declares the rule ${name} more than once`])
			this.forwards.set(name, new Forward<E>(name))
		}

		const definitions = build(name => this.get(name))
		for (const [name, definition] of Object.entries(definitions)) {
			const forward = this.forwards.get(name)
			if (forward === undefined)
				throw new RuleContractError([`grammar defines the undeclared rule ${name}`])
			forward.define(definition)
		}

		const undefined_names = names.filter(name => !this.get(name).is_defined)
		if (undefined_names.length > 0)
			throw new RuleContractError(['grammar leaves these rules undefined:', undefined_names])
	}

	get(name: K): Forward<E> {
		const forward = this.forwards.get(name)
		if (forward === undefined)
			throw new RuleContractError([`grammar has no rule named ${name}`])
		return forward
	}
}


export function ref<E>(resolve: () => Rule<E>): Rule<E> {
	return new Lazy(resolve)
}

export function forward<E>(label?: string): Forward<E> {
	return new Forward<E>(label)
}

export function grammar<K extends string, E>(
	names: readonly K[],
	build: (rule: (name: K) => Rule<E>) => Dict<Rule<E>>,
): Grammar<K, E> {
	return new Grammar(names, build)
}
