/**
 * Token storage using dense arrays with integer IDs.
 * The whole source is tokenized before parsing starts; the store is append-only.
 */

import type { StringId } from './context.ts'

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	Caret: 24,
	Colon: 15,
	Comma: 14,

	// Special (255)
	Eof: 255,
	Float: 102,

	// Identifiers and literals (100-199)
	Identifier: 100,
	// Structural tokens (0-9)
	Indent: 0,
	Integer: 101,

	// Keywords (50)
	Keyword: 50,
	Label: 105,
	LBracket: 12,

	// Punctuation and operators (10-29)
	LParen: 10,
	Minus: 21,
	Newline: 1,
	Plus: 20,
	RBracket: 13,
	RParen: 11,
	Semicolon: 2,
	Slash: 23,
	Star: 22,
	String: 103,
	Variable: 104,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single token - fixed size, no pointers.
 * `text` is the interned lexeme with sigils and quotes removed:
 * - Identifier/Keyword: the word itself
 * - Integer/Float: the literal as written
 * - String: the unescaped contents
 * - Variable/Label: the name after `%` or `@`
 * - Indent/Newline/Eof: the empty string
 */
export interface Token {
	readonly kind: TokenKind
	readonly line: number
	readonly column: number
	/** UTF-8 byte offset of the first character from the start of the source. */
	readonly offset: number
	readonly text: StringId
}

/**
 * Dense array storage for tokens.
 * Append-only during tokenization phase.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}

	/** Returns tokens in range [start, end). */
	slice(start: TokenId, end: TokenId): Token[] {
		return this.tokens.slice(start, end)
	}
}

const PUNCTUATION_TEXT: Partial<Record<TokenKind, string>> = {
	[TokenKind.Caret]: '^',
	[TokenKind.Colon]: ':',
	[TokenKind.Comma]: ',',
	[TokenKind.LBracket]: '[',
	[TokenKind.LParen]: '(',
	[TokenKind.Minus]: '-',
	[TokenKind.Plus]: '+',
	[TokenKind.RBracket]: ']',
	[TokenKind.RParen]: ')',
	[TokenKind.Semicolon]: ';',
	[TokenKind.Slash]: '/',
	[TokenKind.Star]: '*',
}

/** Source spelling of a punctuation or operator kind, null for every other kind. */
export function punctuationText(kind: TokenKind): string | null {
	return PUNCTUATION_TEXT[kind] ?? null
}
