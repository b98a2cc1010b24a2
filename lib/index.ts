export { Rule } from './rule'
export type { Input } from './rule'
export { Span, make_result, succeed, fail, text_of, source_text } from './result'
export type { MatchResult } from './result'
export * from './predicates'
export * from './binary'
export {
	empty, bool, char, token, any_element, bin, bin_bytes, str, str_ref,
	pred, pred_run, read, read_array, read_sequence, ident, end, advance,
} from './terminals'
export type { Decision, Offset, Equals } from './terminals'
export {
	and, seq, or, alt, not, opt, xor, many, many_sep, star, plus, sep_by,
	find, select, test, on_fail, diff,
} from './composites'
export type { Failure, FailureHandler } from './composites'
export { Lazy, Forward, Grammar, ref, forward, grammar } from './reference'
export { extract, capture_text, push_text, capture_value, count, trace } from './actions'
export type { Action } from './actions'
export { unsigned, integer, decimal } from './numbers'
export { Diagnostics, expecting, ParseFailure, locate, parse } from './parse'
export type { Diagnostic, ParseOptions, Location } from './parse'
export { logger } from './logger'
export type { Logger } from './logger'
export { ref_of, RuleContractError, LogError, debug, log } from './utils'
export type { Ref, NonEmpty } from './utils'
