/**
 * Trivia: the non-semantic spans attached before and after a token.
 * Values are created once by the lexer and never change afterwards.
 */

/** Trivia kinds - small integer discriminant. */
export const TriviaKind = {
	Comment: 2,
	ElifDirective: 11,
	ElseDirective: 12,
	EndIfDirective: 13,
	EndOfLine: 1,

	// Conditional directives (10-19), each ends its own line
	IfDirective: 10,

	// Anything else the lexer keeps as trivia (255)
	Other: 255,

	// Layout (0-9)
	Whitespace: 0,
} as const

export type TriviaKind = (typeof TriviaKind)[keyof typeof TriviaKind]

export type DirectiveKind =
	| typeof TriviaKind.IfDirective
	| typeof TriviaKind.ElifDirective
	| typeof TriviaKind.ElseDirective
	| typeof TriviaKind.EndIfDirective

/**
 * A single trivium. Identity matters: two trivia with the same kind and text
 * are still different spans of the source.
 */
export interface Trivia {
	readonly kind: TriviaKind
	readonly text: string
}

/** Trivia in source order. */
export type TriviaList = readonly Trivia[]

export function createTrivia(kind: TriviaKind, text: string): Trivia {
	return { kind, text }
}

export function whitespace(text = ' '): Trivia {
	return createTrivia(TriviaKind.Whitespace, text)
}

export function endOfLine(text = '\n'): Trivia {
	return createTrivia(TriviaKind.EndOfLine, text)
}

export function comment(text: string): Trivia {
	return createTrivia(TriviaKind.Comment, text)
}

/** The text should include the directive's own line terminator. */
export function directive(kind: DirectiveKind, text: string): Trivia {
	return createTrivia(kind, text)
}

/** Stable names used in token stream files and messages. */
export const TRIVIA_KIND_NAMES: Readonly<Record<TriviaKind, string>> = {
	[TriviaKind.Whitespace]: 'whitespace',
	[TriviaKind.EndOfLine]: 'end-of-line',
	[TriviaKind.Comment]: 'comment',
	[TriviaKind.IfDirective]: 'if-directive',
	[TriviaKind.ElifDirective]: 'elif-directive',
	[TriviaKind.ElseDirective]: 'else-directive',
	[TriviaKind.EndIfDirective]: 'endif-directive',
	[TriviaKind.Other]: 'other',
}

const KINDS_BY_NAME: ReadonlyMap<string, TriviaKind> = new Map(
	Object.values(TriviaKind).map((kind): [string, TriviaKind] => [TRIVIA_KIND_NAMES[kind], kind])
)

export function triviaKindFromName(name: string): TriviaKind | null {
	return KINDS_BY_NAME.get(name) ?? null
}

export function triviaText(list: TriviaList): string {
	return list.map((trivia) => trivia.text).join('')
}
