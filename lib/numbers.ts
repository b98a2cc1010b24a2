import type { Rule } from './rule'
import type { Ref } from './utils'
import { Span } from './result'
import { capture_value } from './actions'
import { seq, alt, opt } from './composites'
import { pred, pred_run } from './terminals'
import { is_digit, is_char, is_one_of } from './predicates'
import type { CharLike } from './predicates'

function digits<E extends CharLike>(min: number): Rule<E> {
	return pred_run<E>(is_digit, min)
}

function sign<E extends CharLike>(): Rule<E> {
	return opt(pred<E>(is_one_of('+-')))
}

function captured<E extends CharLike>(rule: Rule<E>, destination: Ref<number> | undefined): Rule<E> {
	return destination === undefined
		? rule
		: capture_value(rule, destination, span => Number(Span.text(span)))
}

export function unsigned<E extends CharLike = string>(destination?: Ref<number>): Rule<E> {
	return captured(digits<E>(1), destination)
}

export function integer<E extends CharLike = string>(destination?: Ref<number>): Rule<E> {
	return captured(seq(sign<E>(), digits<E>(1)), destination)
}

// 12, -1.5, .5, 3., 6.02e23, 1E-9
export function decimal<E extends CharLike = string>(destination?: Ref<number>): Rule<E> {
	const point = pred<E>(is_char('.'))
	const mantissa = alt(
		seq(digits<E>(1), opt(seq(point, digits<E>(0)))),
		seq(point, digits<E>(1)),
	)
	const exponent = seq(pred<E>(is_one_of('eE')), sign<E>(), digits<E>(1))

	return captured(seq(sign<E>(), mantissa, opt(exponent)), destination)
}
