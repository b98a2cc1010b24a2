export type MatchResult = Readonly<{
	matched: boolean,
	// past the last consumed element on success, the rewind position on failure
	position: number,
	// where the attempt began
	start: number,
}>

export function make_result(matched: boolean, position: number, start: number): MatchResult {
	return { matched, position: matched ? position : start, start }
}

export function succeed(position: number, start: number): MatchResult {
	return { matched: true, position, start }
}

export function fail(start: number): MatchResult {
	return { matched: false, position: start, start }
}

export type Span<E> = Readonly<{
	input: ArrayLike<E>,
	start: number,
	end: number,
}>

export namespace Span {
	export function of<E>(input: ArrayLike<E>, result: MatchResult): Span<E> {
		return { input, start: result.start, end: result.position }
	}

	export function length<E>(span: Span<E>) {
		return span.end - span.start
	}

	// meant for text and byte input, token input reads better through elements()
	export function text<E>(span: Span<E>): string {
		return text_of(span.input, span.start, span.end)
	}

	export function elements<E>(span: Span<E>): E[] {
		const elements = [] as E[]
		for (let index = span.start; index < span.end; index++)
			elements.push(span.input[index])
		return elements
	}
}

export function source_text<E>(input: ArrayLike<E> | string): string | undefined {
	return typeof input === 'string' ? input : undefined
}

// numbers are taken as character codes, other elements are joined through String()
export function text_of<E>(input: ArrayLike<E> | string, start: number, end: number): string {
	if (typeof input === 'string')
		return input.slice(start, end)

	let text = ''
	for (let index = start; index < end; index++) {
		const element = input[index]
		text += typeof element === 'number'
			? String.fromCharCode(element)
			: String(element)
	}
	return text
}
