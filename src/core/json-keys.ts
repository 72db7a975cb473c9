const WHITESPACE = new Set([' ', '\t', '\n', '\r'])

function skipWhitespace(text: string, i: number): number {
	while (i < text.length && WHITESPACE.has(text[i])) i++
	return i
}

/** Returns the index just past the string literal starting at `i`. */
function skipString(text: string, i: number): number {
	i++
	while (i < text.length) {
		if (text[i] === '\\') i += 2
		else if (text[i] === '"') return i + 1
		else i++
	}
	return i
}

/** Returns the index of the `,` or `}` that ends the value starting at `i`. */
function skipValue(text: string, i: number): number {
	let depth = 0
	while (i < text.length) {
		const ch = text[i]
		if (ch === '"') {
			i = skipString(text, i)
			continue
		}
		if (ch === '{' || ch === '[') depth++
		else if (ch === '}' || ch === ']') {
			if (depth === 0) return i
			depth--
		} else if (ch === ',' && depth === 0) return i
		i++
	}
	return i
}

/**
 * Lists the keys of the top-level JSON object in `text` in document order.
 *
 * `JSON.parse` moves integer-like keys ahead of the others; this recovers the order the
 * provider sent. Expects text that already parsed as JSON. Duplicate keys keep their first
 * position, matching where `JSON.parse` places them. Returns null when the top level is not an
 * object.
 */
export function topLevelKeys(text: string): string[] | null {
	let i = skipWhitespace(text, 0)
	if (text[i] !== '{') return null
	i++

	const keys: string[] = []
	const seen = new Set<string>()
	while (i < text.length) {
		i = skipWhitespace(text, i)
		if (text[i] === '}') break
		if (text[i] === ',') {
			i++
			continue
		}

		const end = skipString(text, i)
		const key: unknown = JSON.parse(text.slice(i, end))
		if (typeof key !== 'string') return null
		if (!seen.has(key)) {
			seen.add(key)
			keys.push(key)
		}

		i = skipWhitespace(text, end)
		i++ // ':'
		i = skipValue(text, skipWhitespace(text, i))
	}
	return keys
}
