import { Ok, Err } from '@ts-std/monads'
import type { Result } from '@ts-std/monads'

import {
	grammar, seq, alt, opt, many, many_sep, diff, char, str, pred_run, any_element,
	is_space, decimal, push_text, expecting, parse, Diagnostics,
} from '../lib'
import type { Rule, ParseFailure } from '../lib'

type JsonRule = 'value' | 'object' | 'array' | 'member'

// recognizes a json document and collects every object key in document order
export function json_keys(source: string, filename?: string): Result<string[], ParseFailure> {
	const keys = [] as string[]
	const diagnostics = new Diagnostics()

	const ws = pred_run<string>(is_space)
	function token(rule: Rule<string>) {
		return seq(rule, ws)
	}
	function open(character: string) {
		return token(char(character))
	}
	function punctuation(character: string) {
		return token(expecting(char(character), `expected "${character}"`, diagnostics))
	}

	const escape = seq(char('\\'), any_element<string>())
	const content = many(alt(escape, diff(any_element<string>(), alt(char('"'), char('\\')))))
	const string = token(seq(char('"'), content, char('"')))
	const key = token(seq(char('"'), push_text(content, keys), char('"')))
	const literal = token(alt(str('true'), str('false'), str('null'), decimal()))

	const json = grammar<JsonRule, string>(['value', 'object', 'array', 'member'], rule => ({
		value: expecting(alt(rule('object'), rule('array'), string, literal), 'expected a value', diagnostics),
		member: seq(key, punctuation(':'), rule('value')),
		object: seq(open('{'), opt(many_sep(rule('member'), punctuation(','))), punctuation('}')),
		array: seq(open('['), opt(many_sep(rule('value'), punctuation(','))), punctuation(']')),
	}))

	return parse(seq(ws, json.get('value')), source, { diagnostics, filename }).match({
		ok: (): Result<string[], ParseFailure> => Ok(keys),
		err: (failure): Result<string[], ParseFailure> => Err(failure),
	})
}
