import { type Trivia, TriviaKind } from '../core/trivia.ts'

/*
 * Predicates take `undefined` so a read past either end of a list can be
 * tested directly; it is never any kind.
 */

export function isWhitespace(trivia: Trivia | undefined): boolean {
	return trivia?.kind === TriviaKind.Whitespace
}

export function isEndOfLine(trivia: Trivia | undefined): boolean {
	return trivia?.kind === TriviaKind.EndOfLine
}

/** Whitespace or a line break. */
export function isLayout(trivia: Trivia | undefined): boolean {
	return isWhitespace(trivia) || isEndOfLine(trivia)
}

export function isComment(trivia: Trivia | undefined): boolean {
	return trivia?.kind === TriviaKind.Comment
}

/**
 * Conditional compilation markers. Each one terminates a line by itself,
 * without a separate end-of-line trivium after it.
 */
export function isDirective(trivia: Trivia | undefined): boolean {
	switch (trivia?.kind) {
		case TriviaKind.IfDirective:
		case TriviaKind.ElifDirective:
		case TriviaKind.ElseDirective:
		case TriviaKind.EndIfDirective:
			return true
		default:
			return false
	}
}
