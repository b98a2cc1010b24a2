// classification follows the "C" locale: only ascii elements are ever alphabetic, digits, etc
// elements may be one-character strings (text input) or numbers (byte input),
// any other string classifies as nothing

import { RuleContractError } from './utils'

export type Predicate<E> = (element: E) => boolean
export type CharLike = string | number

function code_of(element: CharLike): number {
	if (typeof element === 'number')
		return element
	return element.length === 1 ? element.charCodeAt(0) : NaN
}

function target_code(what: string, target: CharLike) {
	if (typeof target === 'string' && target.length !== 1)
		throw new RuleContractError([`${what} expects a single character, got:`, target])
	return code_of(target)
}

function in_range(code: number, low: number, high: number) {
	return code >= low && code <= high
}

const [ZERO, NINE] = [0x30, 0x39]
const [UPPER_A, UPPER_Z] = [0x41, 0x5a]
const [LOWER_A, LOWER_Z] = [0x61, 0x7a]

export function is_digit(element: CharLike) {
	return in_range(code_of(element), ZERO, NINE)
}
export function is_upper(element: CharLike) {
	return in_range(code_of(element), UPPER_A, UPPER_Z)
}
export function is_lower(element: CharLike) {
	return in_range(code_of(element), LOWER_A, LOWER_Z)
}
export function is_alpha(element: CharLike) {
	return is_upper(element) || is_lower(element)
}
export function is_alnum(element: CharLike) {
	return is_alpha(element) || is_digit(element)
}
export function is_xdigit(element: CharLike) {
	const code = code_of(element)
	return in_range(code, ZERO, NINE)
		|| in_range(code, UPPER_A, 0x46)
		|| in_range(code, LOWER_A, 0x66)
}
export function is_oct_digit(element: CharLike) {
	return in_range(code_of(element), ZERO, 0x37)
}
export function is_bin_digit(element: CharLike) {
	return in_range(code_of(element), ZERO, 0x31)
}
// space, \t \n \v \f \r
export function is_space(element: CharLike) {
	const code = code_of(element)
	return code === 0x20 || in_range(code, 0x09, 0x0d)
}
export function is_control(element: CharLike) {
	const code = code_of(element)
	return in_range(code, 0x00, 0x1f) || code === 0x7f
}
export function is_printable(element: CharLike) {
	return in_range(code_of(element), 0x20, 0x7e)
}
export function is_punct(element: CharLike) {
	return in_range(code_of(element), 0x21, 0x7e) && !is_alnum(element)
}
export function is_any(_element: unknown) {
	return true
}

export function is_char(target: CharLike): Predicate<CharLike> {
	const code = target_code('is_char', target)
	return element => code_of(element) === code
}

export function is_one_of(set: string): Predicate<CharLike> {
	const codes = new Set(Array.from(set, c => c.charCodeAt(0)))
	return element => codes.has(code_of(element))
}

// inclusive on both ends
export function is_range(low: CharLike, high: CharLike): Predicate<CharLike> {
	const [low_code, high_code] = [target_code('is_range', low), target_code('is_range', high)]
	return element => in_range(code_of(element), low_code, high_code)
}

export function pred_and<E>(...predicates: Predicate<E>[]): Predicate<E> {
	return element => predicates.every(predicate => predicate(element))
}
export function pred_or<E>(...predicates: Predicate<E>[]): Predicate<E> {
	return element => predicates.some(predicate => predicate(element))
}
export function pred_not<E>(predicate: Predicate<E>): Predicate<E> {
	return element => !predicate(element)
}
