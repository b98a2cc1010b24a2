import chalk from 'chalk'
import { Ok, Err, Some, None } from '@ts-std/monads'
import type { Result, Maybe } from '@ts-std/monads'

import type { Rule, Input } from './rule'
import { Span, source_text } from './result'
import { on_fail } from './composites'

export type Diagnostic = Readonly<{ position: number, message: string }>

// collects what failure hooks report, parse() surfaces the one furthest into the input
export class Diagnostics {
	protected readonly reported = [] as Diagnostic[]

	report(position: number, message: string) {
		this.reported.push({ position, message })
	}

	get all(): readonly Diagnostic[] {
		return this.reported
	}

	furthest(): Maybe<Diagnostic> {
		let furthest: Maybe<Diagnostic> = None
		let furthest_position = -1
		for (const diagnostic of this.reported)
			if (diagnostic.position > furthest_position) {
				furthest = Some(diagnostic)
				furthest_position = diagnostic.position
			}
		return furthest
	}

	clear() {
		this.reported.length = 0
	}
}

export function expecting<E>(rule: Rule<E>, message: string, diagnostics: Diagnostics): Rule<E> {
	return on_fail(rule, ({ position }) => {
		diagnostics.report(position, message)
	})
}


export type ParseOptions = Partial<Readonly<{
	begin: number,
	end: number,
	require_end: boolean,
	filename: string,
	diagnostics: Diagnostics,
}>>

// line is 1-based, column 0-based, both only meaningful for text input
export type Location = Readonly<{ line: number, column: number }>

export function locate(source: string, position: number): Location {
	let line = 1
	let line_start = 0
	for (let index = 0; index < position && index < source.length; index++)
		if (source[index] === '\n') {
			line++
			line_start = index + 1
		}
	return { line, column: position - line_start }
}

export class ParseFailure {
	readonly location: Location | undefined
	constructor(
		readonly source: string | undefined,
		readonly position: number,
		readonly message: string,
		readonly filename?: string,
	) {
		this.location = source !== undefined ? locate(source, position) : undefined
	}

	toString() {
		const where = this.location !== undefined
			? `${this.location.line}:${this.location.column}`
			: `${this.position}`
		return this.filename !== undefined
			? `${this.filename}:${where}: ${this.message}`
			: `${where}: ${this.message}`
	}

	render(colors: chalk.Chalk = chalk) {
		const err = colors.red.bold
		const bold = colors.white.bold
		const info = colors.blue.bold
		const file = colors.magentaBright.bold
		const pos = colors.cyanBright.bold

		const title = err('error') + bold(`: ${this.message}`)
		if (this.source === undefined || this.location === undefined)
			return title + info(` at position ${this.position}`)

		const { source, location: { line, column } } = this
		const line_number_width = line.toString().length
		function make_margin(line_number?: number) {
			const insert = line_number !== undefined
				? ' '.repeat(line_number_width - line_number.toString().length) + line_number
				: ' '.repeat(line_number_width)
			return info(`\n ${insert} |  `)
		}
		const blank_margin = make_margin()

		const line_start = this.position - column
		const newline = source.indexOf('\n', line_start)
		const source_line = source.slice(line_start, newline === -1 ? source.length : newline)

		const print_source_line = source_line.replace(/\t/g, '  ')
		const pointer_prefix = source_line.slice(0, column).replace(/\t/g, '  ')
		const pointer = pointer_prefix + err('^')

		const header = this.filename !== undefined
			? '\n' + ' '.repeat(line_number_width + 2) + file(this.filename) + ':' + pos(line) + ':' + pos(column)
			: ''

		return title
			+ header
			+ blank_margin
			+ make_margin(line) + print_source_line
			+ blank_margin + pointer
	}
}

export function parse<E>(rule: Rule<E>, input: Input<E>, options: ParseOptions = {}): Result<Span<E>, ParseFailure> {
	const {
		begin = 0, end = input.length,
		require_end = true, filename, diagnostics,
	} = options
	const source = source_text(input)

	if (diagnostics !== undefined)
		diagnostics.clear()

	const result = rule.match(input, begin, end)
	if (!result.matched) {
		const furthest: Maybe<Diagnostic> = diagnostics !== undefined ? diagnostics.furthest() : None
		return Err(furthest.match({
			some: ({ position, message }) => new ParseFailure(source, position, message, filename),
			none: () => new ParseFailure(source, result.position, 'input did not match', filename),
		}))
	}

	if (require_end && result.position !== end)
		return Err(new ParseFailure(source, result.position, 'expected end of input', filename))

	return Ok(Span.of(input, result))
}
