/**
 * JSON.stringify that never throws (cycles, BigInt) and never returns undefined
 */
export function safeStringify(value: unknown, indent?: number): string {
	try {
		const text = JSON.stringify(value, null, indent)
		return text === undefined ? String(value) : text
	} catch {
		return String(value)
	}
}
