import 'mocha'
import { expect } from 'chai'

import {
	and, seq, or, alt, not, opt, xor, many, many_sep, star, plus, sep_by,
	find, select, test, on_fail, diff,
} from './composites'
import { char, str, empty, end, any_element, pred_run, read } from './terminals'
import { count, capture_text } from './actions'
import { is_digit } from './predicates'
import { u8 } from './binary'
import { ref_of, RuleContractError } from './utils'
import type { Rule } from './rule'

describe('and', () => {
	it('matches both rules one after the other', () => {
		expect(and(char('a'), char('b')).run('abc')).eql({ matched: true, position: 2, start: 0 })
	})

	it('rewinds fully when the second rule fails', () => {
		expect(and(char('a'), char('b')).run('ac')).eql({ matched: false, position: 0, start: 0 })
	})

	it('is associative', () => {
		const [a, b, c] = [char('a'), opt(char('b')), char('c')]
		const left = and(and(a, b), c)
		const right = and(a, and(b, c))
		for (const input of ['abc', 'ac', 'ab', 'abcd', 'xbc', ''])
			for (let begin = 0; begin <= input.length; begin++)
				expect(left.run(input, begin)).eql(right.run(input, begin))
	})

	it('seq chains any number of rules', () => {
		expect(seq(char('a'), char('b'), char('c')).run('abcd')).eql({ matched: true, position: 3, start: 0 })
		expect(seq(char('a'), char('b'), char('c')).run('abd').matched).false
		expect(seq(char('a')).run('a').position).eql(1)
	})
})

describe('or', () => {
	it('takes the first alternative that matches', () => {
		const keyword = or(str('in'), str('int'))
		expect(keyword.run('int')).eql({ matched: true, position: 2, start: 0 })
		expect(or(str('int'), str('in')).run('int').position).eql(3)
	})

	it('tries the second alternative from the same start', () => {
		expect(or(str('ab'), str('ac')).run('ac')).eql({ matched: true, position: 2, start: 0 })
		expect(or(char('x'), char('y')).run('z')).eql({ matched: false, position: 0, start: 0 })
	})

	it('never evaluates the second alternative when the first matches', () => {
		const attempts = ref_of(0)
		const counted = count(or(test(any_element<string>()), empty<string>()), attempts)
		const rule = or(char('a'), and(counted, char('b')))
		expect(rule.run('a').matched).true
		expect(attempts.value).eql(0)
		expect(rule.run('b').matched).true
		expect(attempts.value).eql(1)
	})

	it('alt chooses among many alternatives', () => {
		const digit_word = alt(str('one'), str('two'), str('three'))
		expect(digit_word.run('three').position).eql(5)
		expect(digit_word.run('four').matched).false
	})
})

describe('not', () => {
	it('inverts without consuming', () => {
		expect(not(char('a')).run('b')).eql({ matched: true, position: 0, start: 0 })
		expect(not(char('a')).run('a')).eql({ matched: false, position: 0, start: 0 })
		expect(not(char('a')).run('')).eql({ matched: true, position: 0, start: 0 })
	})

	it('never moves the position', () => {
		const rules: Rule<string>[] = [char('a'), str('ab'), empty(), end(), many(char('a')), not(char('b'))]
		for (const rule of rules)
			for (const input of ['', 'a', 'ab', 'ba'])
				for (let begin = 0; begin <= input.length; begin++)
					expect(not(rule).run(input, begin).position).eql(begin)
	})
})

describe('opt', () => it('always matches, consuming only when the rule does', () => {
	expect(opt(char('a')).run('ab')).eql({ matched: true, position: 1, start: 0 })
	expect(opt(char('a')).run('b')).eql({ matched: true, position: 0, start: 0 })
}))

describe('xor', () => it('matches when exactly one side matches', () => {
	const rule = xor(str('ab'), char('a'))
	expect(rule.run('ab')).eql({ matched: false, position: 0, start: 0 })
	expect(xor(char('a'), char('b')).run('b')).eql({ matched: true, position: 1, start: 0 })
	expect(xor(char('a'), char('b')).run('a')).eql({ matched: true, position: 1, start: 0 })
	expect(xor(char('a'), char('b')).run('c')).eql({ matched: false, position: 0, start: 0 })
}))

describe('many', () => {
	it('needs the minimum and is greedy without a maximum', () => {
		expect(many(char('x'), 2).run('xxxy')).eql({ matched: true, position: 3, start: 0 })
		expect(many(char('x'), 2).run('xy')).eql({ matched: false, position: 0, start: 0 })
	})

	it('stops at the maximum', () => {
		expect(many(char('x'), 0, 2).run('xxxx')).eql({ matched: true, position: 2, start: 0 })
		expect(many(char('x'), 0, 0).run('xx')).eql({ matched: true, position: 0, start: 0 })
	})

	it('star and plus', () => {
		expect(star(char('x')).run('y')).eql({ matched: true, position: 0, start: 0 })
		expect(plus(char('x')).run('y').matched).false
		expect(plus(char('x')).run('xxy').position).eql(2)
	})

	it('counts a zero-width repetition once and stops', () => {
		const attempts = ref_of(0)
		const rule = many(count(opt(char('a')), attempts))
		expect(rule.run('b')).eql({ matched: true, position: 0, start: 0 })
		expect(attempts.value).eql(1)

		expect(many(empty<string>(), 2).run('b').matched).false
		expect(many(empty<string>(), 1).run('b').matched).true
	})

	it('rejects inconsistent bounds', () => {
		expect(() => many(char('x'), 3, 1)).throw(RuleContractError)
		expect(() => many(char('x'), -1)).throw(RuleContractError)
	})
})

describe('many_sep', () => {
	const item = pred_run(is_digit, 1)
	const comma = char(',')

	it('stops after the maximum number of repetitions', () => {
		const rule = many_sep(item, comma, 1, 3)
		expect(rule.run('1,2,3,4,5')).eql({ matched: true, position: 5, start: 0 })
	})

	it('fails with no repetitions below the minimum', () => {
		expect(many_sep(item, comma, 1, 3).run('x')).eql({ matched: false, position: 0, start: 0 })
		expect(many_sep(item, comma, 0, 3).run('x')).eql({ matched: true, position: 0, start: 0 })
	})

	it('leaves a trailing separator unconsumed', () => {
		expect(many_sep(item, comma).run('1,22,')).eql({ matched: true, position: 4, start: 0 })
	})

	it('sep_by needs at least one repetition', () => {
		expect(sep_by(item, comma).run('7;8')).eql({ matched: true, position: 1, start: 0 })
		expect(sep_by(item, comma).run(';').matched).false
	})
})

describe('find', () => {
	it('skips input until the rule matches', () => {
		expect(find(str('end')).run('the end.')).eql({ matched: true, position: 7, start: 0 })
		expect(find(str('the')).run('the end').position).eql(3)
	})

	it('tries the end of the range as well', () => {
		expect(find(end<string>()).run('abc', 1)).eql({ matched: true, position: 3, start: 1 })
	})

	it('fails at its start when nothing matches', () => {
		expect(find(char('z')).run('abc', 1)).eql({ matched: false, position: 1, start: 1 })
	})
})

describe('select', () => {
	it('continues with then after a matching discriminator', () => {
		const rule = select(char('-'), pred_run(is_digit, 1), str('zero'))
		expect(rule.run('-12')).eql({ matched: true, position: 3, start: 0 })
		expect(rule.run('-x')).eql({ matched: false, position: 0, start: 0 })
	})

	it('falls back to otherwise from the start', () => {
		const rule = select(char('-'), pred_run(is_digit, 1), str('zero'))
		expect(rule.run('zero')).eql({ matched: true, position: 4, start: 0 })
		expect(rule.run('one').matched).false
	})

	it('evaluates the discriminator exactly once', () => {
		for (const input of ['ab', 'ac', 'xb', 'xc']) {
			const evaluations = ref_of(0)
			const rule = select(count(char('a'), evaluations), char('b'), char('x'))
			rule.run(input)
			expect(evaluations.value).eql(input[0] === 'a' ? 1 : 0)
		}

		const attempts = ref_of(0)
		const discriminator = or(count(char('a'), attempts), and(count(test(empty<string>()), attempts), char('!')))
		select(discriminator, char('b'), char('c')).run('xc')
		expect(attempts.value).eql(1)
	})
})

describe('test', () => {
	it('reports the outcome at the start position', () => {
		expect(test(str('ab')).run('abc')).eql({ matched: true, position: 0, start: 0 })
		expect(test(str('ab')).run('ax', 0)).eql({ matched: false, position: 0, start: 0 })
	})

	it('keeps the side effects of a match', () => {
		const captured = ref_of(0)
		const rule = test(read(u8, captured))
		expect(rule.run([9])).eql({ matched: true, position: 0, start: 0 })
		expect(captured.value).eql(9)

		const text = ref_of('')
		expect(and(test(capture_text(str('ab'), text)), str('abc')).run('abc').position).eql(3)
		expect(text.value).eql('ab')
	})
})

describe('on_fail', () => {
	it('runs the handler once when the rule fails', () => {
		const failures = [] as number[]
		const rule = on_fail(or(char('a'), char('b')), ({ position }) => {
			failures.push(position)
		})
		expect(rule.run('xc', 1)).eql({ matched: false, position: 1, start: 1 })
		expect(failures).eql([1])
		expect(rule.run('b').matched).true
		expect(failures).eql([1])
	})

	it('passes the input and range to the handler', () => {
		let seen = ''
		on_fail(char('a'), ({ input, position, end }) => {
			seen = `${input}:${position}:${end}`
		}).run('xyz', 1, 2)
		expect(seen).eql('xyz:1:2')
	})

	it('recovers at the position the handler returns', () => {
		const statement = seq(str('ok'), char(';'))
		const recovering = on_fail(statement, ({ input, position, end }) => {
			for (let index = position; index < end; index++)
				if (input[index] === ';')
					return index + 1
		})
		const program = many(recovering)
		expect(program.run('ok;bad;ok;')).eql({ matched: true, position: 10, start: 0 })
		expect(recovering.run('bad')).eql({ matched: false, position: 0, start: 0 })
	})

	it('rejects a resume position outside the range', () => {
		const rule = on_fail(char('a'), () => 5)
		expect(() => rule.run('xyz')).throw(RuleContractError)
	})
})

describe('diff', () => it('matches the left rule where the right one does not', () => {
	const letter_but_not_q = diff(any_element<string>(), char('q'))
	expect(letter_but_not_q.run('a')).eql({ matched: true, position: 1, start: 0 })
	expect(letter_but_not_q.run('q')).eql({ matched: false, position: 0, start: 0 })
	const word = many(diff(any_element<string>(), char(' ')), 1)
	expect(word.run('hello world').position).eql(5)
}))
