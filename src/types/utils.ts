/**
 * Core type utilities.
 * Cache payloads and result rows must stay serializable, so they are typed as JSON.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON value type.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * JSON object type - strictly typed alternative to Record<string, any>
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 * JSON array type
 */
export interface JsonArray extends Array<JsonValue> {}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a value coming back from a database driver into JSON.
 * Dates become ISO strings, buffers and bigints become strings.
 */
export function toJsonValue(value: unknown): JsonValue {
	if (value === null || value === undefined) return null;
	if (typeof value === 'string' || typeof value === 'boolean') return value;
	if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
	if (typeof value === 'bigint') return value.toString();
	if (value instanceof Date) return value.toISOString();
	if (Buffer.isBuffer(value)) return value.toString('base64');
	if (Array.isArray(value)) return value.map(toJsonValue);
	if (typeof value === 'object') {
		const out: JsonObject = {};
		for (const [key, inner] of Object.entries(value)) {
			out[key] = toJsonValue(inner);
		}
		return out;
	}
	return String(value);
}
