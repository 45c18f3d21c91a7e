import { createTrivia, type Trivia, TriviaKind, type TriviaList } from '../src/core/trivia.ts'

const SHORTHAND: Record<string, Trivia> = {
	c: createTrivia(TriviaKind.Comment, '// note'),
	elif: createTrivia(TriviaKind.ElifDirective, '#elif B\n'),
	else: createTrivia(TriviaKind.ElseDirective, '#else\n'),
	endif: createTrivia(TriviaKind.EndIfDirective, '#endif\n'),
	eol: createTrivia(TriviaKind.EndOfLine, '\n'),
	if: createTrivia(TriviaKind.IfDirective, '#if A\n'),
	ws: createTrivia(TriviaKind.Whitespace, '  '),
	x: createTrivia(TriviaKind.Other, '@@'),
}

/**
 * Builds a trivia list from shorthand such as `'c ws eol'`.
 * Every entry is a fresh object, so identity checks see distinct trivia.
 */
export function triviaList(shorthand: string): Trivia[] {
	const names = shorthand.trim().split(/\s+/).filter((name) => name.length > 0)
	return names.map((name) => {
		const template = SHORTHAND[name]
		if (template === undefined) throw new Error(`Unknown trivia shorthand: ${name}`)
		return createTrivia(template.kind, template.text)
	})
}

/** Inverse of `triviaList`, for readable assertions. */
export function shorthandOf(list: TriviaList): string {
	return list
		.map((trivia) => {
			const entry = Object.entries(SHORTHAND).find(([, template]) => template.kind === trivia.kind)
			return entry?.[0] ?? '?'
		})
		.join(' ')
}
