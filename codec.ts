import { z } from "zod";
import type { JsonObject, JsonValue } from "./types";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([z.string(), z.number().finite(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

// Anything with a zod-style parse
type ZodLike<T> = { parse: (data: unknown) => T };

export type TextCodec<T> = {
	encode: (value: T) => string;
	decode: (text: string) => T;
};

/**
 * JSON text codec for storage columns. Values are validated on decode.
 */
export function json_codec<T>(schema: ZodLike<T>): TextCodec<T> {
	return {
		encode: value => JSON.stringify(value),
		decode: text => schema.parse(JSON.parse(text)),
	};
}

export const json_value_codec = json_codec(JsonValueSchema);
export const json_object_codec = json_codec(JsonObjectSchema);
