import { readFileSync } from 'node:fs'

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((word) => typeof word === 'string')
}

function loadKeywords(): ReadonlySet<string> {
	const parsed: unknown = JSON.parse(readFileSync(new URL('./keywords.json', import.meta.url), 'utf-8'))
	if (!isStringArray(parsed)) {
		throw new Error('keywords.json must be an array of strings')
	}
	return new Set(parsed)
}

/** Reserved words. Matching is case-sensitive: `measure` is an identifier. */
export const KEYWORDS: ReadonlySet<string> = loadKeywords()

export function isKeyword(word: string): boolean {
	return KEYWORDS.has(word)
}
