import { Rule } from './rule'
import type { Input } from './rule'
import type { Ref } from './utils'
import { logger as default_logger } from './logger'
import type { Logger } from './logger'
import { Span, succeed } from './result'
import type { MatchResult } from './result'

export type Action<E> = (span: Span<E>) => void

// runs the action after every successful match, never after a failed one
export class Extract<E> extends Rule<E> {
	constructor(
		readonly rule: Rule<E>,
		readonly action: Action<E>,
	) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		const result = this.rule.match(input, begin, end)
		if (!result.matched)
			return result

		this.action({ input, start: begin, end: result.position })
		return succeed(result.position, begin)
	}
}

export class Trace<E> extends Rule<E> {
	constructor(
		readonly name: string,
		readonly rule: Rule<E>,
		readonly logger: Logger,
	) { super() }

	match(input: Input<E>, begin: number, end: number): MatchResult {
		this.logger.log(`${this.name} @ ${begin}: attempting`)
		const result = this.rule.match(input, begin, end)
		this.logger.log(result.matched
			? `${this.name} @ ${begin}: matched -> ${result.position}`
			: `${this.name} @ ${begin}: failed`
		)
		return result
	}
}


export function extract<E>(rule: Rule<E>, action: Action<E>): Rule<E> {
	return new Extract(rule, action)
}

export function capture_text<E>(rule: Rule<E>, destination: Ref<string>): Rule<E> {
	return new Extract(rule, span => {
		destination.value = Span.text(span)
	})
}

export function push_text<E>(rule: Rule<E>, destination: string[]): Rule<E> {
	return new Extract(rule, span => {
		destination.push(Span.text(span))
	})
}

export function capture_value<E, T>(rule: Rule<E>, destination: Ref<T>, convert: (span: Span<E>) => T): Rule<E> {
	return new Extract(rule, span => {
		destination.value = convert(span)
	})
}

export function count<E>(rule: Rule<E>, destination: Ref<number>): Rule<E> {
	return new Extract(rule, () => {
		destination.value++
	})
}

export function trace<E>(name: string, rule: Rule<E>, logger: Logger = default_logger): Rule<E> {
	return new Trace(name, rule, logger)
}
