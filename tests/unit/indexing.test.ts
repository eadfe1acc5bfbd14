import { describe, test, expect } from "vitest";
import { compile_lookup, match_key, match_raw, parse_predicate, to_index_key } from "../../userdb/indexing";
import { unwrap } from "../../result";
import { compare_text } from "../../utils";

describe("to_index_key", () => {
	test("keeps strings for string columns", () => {
		expect(to_index_key("open", "string")).toBe("open");
		expect(to_index_key(5, "string")).toBeNull();
	});

	test("accepts finite numbers for number columns", () => {
		expect(to_index_key(12.5, "number")).toBe(12.5);
		expect(to_index_key("12.5", "number")).toBeNull();
	});

	test("requires whole numbers for integer columns", () => {
		expect(to_index_key(7, "integer")).toBe(7);
		expect(to_index_key(1.5, "integer")).toBeNull();
	});

	test("stores booleans as 1 and 0", () => {
		expect(to_index_key(true, "boolean")).toBe(1);
		expect(to_index_key(false, "boolean")).toBe(0);
		expect(to_index_key("true", "boolean")).toBeNull();
	});

	test("stores datetimes as epoch ms and reads a missing offset as UTC", () => {
		expect(to_index_key("1970-01-01T00:00:01Z", "datetime")).toBe(1000);
		expect(to_index_key("1970-01-01T00:00:01", "datetime")).toBe(1000);
		expect(to_index_key("1970-01-01T01:00:00+01:00", "datetime")).toBe(0);
		expect(to_index_key("yesterday", "datetime")).toBeNull();
		expect(to_index_key(1000, "datetime")).toBeNull();
	});
});

describe("parse_predicate", () => {
	test("treats a bare scalar as equality", () => {
		expect(parse_predicate("open")).toEqual({ ok: true, value: { kind: "eq", value: "open" } });
	});

	test("parses eq, in and range forms", () => {
		expect(parse_predicate({ eq: 3 })).toEqual({ ok: true, value: { kind: "eq", value: 3 } });
		expect(parse_predicate({ in: ["a", "b"] })).toEqual({ ok: true, value: { kind: "in", values: ["a", "b"] } });
		expect(parse_predicate({ gte: 10, lt: 20 })).toEqual({
			ok: true,
			value: { kind: "range", gt: undefined, gte: 10, lt: 20, lte: undefined },
		});
	});

	test("rejects unknown shapes", () => {
		expect(parse_predicate({ between: [1, 2] }).ok).toBe(false);
		expect(parse_predicate({}).ok).toBe(false);
		expect(parse_predicate(null).ok).toBe(false);

		const result = parse_predicate([1]);
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.kind).toBe("invalid_input");
	});
});

describe("compile_lookup", () => {
	test("coerces values into the column key space", () => {
		const lookup = compile_lookup(unwrap(parse_predicate({ gte: "1970-01-01T00:00:01Z" })), "datetime");
		expect(lookup).toEqual({ ok: true, value: { kind: "range", gte: 1000 } });

		expect(compile_lookup(unwrap(parse_predicate(true)), "boolean")).toEqual({ ok: true, value: { kind: "eq", value: 1 } });
	});

	test("rejects values of the wrong type", () => {
		expect(compile_lookup(unwrap(parse_predicate({ in: ["open", 3] })), "string")).toEqual({
			ok: false,
			error: { kind: "invalid_input", message: "predicate value 3 is not a string" },
		});
	});
});

describe("match_key", () => {
	test("matches equality and membership", () => {
		expect(match_key("open", { kind: "eq", value: "open" })).toBe(true);
		expect(match_key("open", { kind: "in", values: ["closed", "open"] })).toBe(true);
		expect(match_key("open", { kind: "in", values: [] })).toBe(false);
	});

	test("applies every range bound", () => {
		const range = { kind: "range" as const, gte: 10, lt: 20 };
		expect(match_key(10, range)).toBe(true);
		expect(match_key(19.5, range)).toBe(true);
		expect(match_key(20, range)).toBe(false);
		expect(match_key(9, range)).toBe(false);
	});

	test("orders strings by code point", () => {
		expect(match_key("\u{1f600}", { kind: "range", gt: "\uff01" })).toBe(true);
		expect(match_key("\uff01", { kind: "range", gte: "\u{1f600}" })).toBe(false);
	});

	test("never compares a string with a number", () => {
		expect(match_key("15", { kind: "range", gte: 10 })).toBe(false);
	});
});

describe("match_raw", () => {
	test("compares document values as they are", () => {
		expect(match_raw("open", { kind: "eq", value: "open" })).toBe(true);
		expect(match_raw(1, { kind: "eq", value: true })).toBe(false);
		expect(match_raw("b", { kind: "range", gt: "a" })).toBe(true);
	});

	test("compares strings by code point", () => {
		expect(match_raw("\u{1f600}", { kind: "range", gt: "\uff01" })).toBe(true);
		expect(match_raw("\uff01", { kind: "range", lt: "\u{1f600}" })).toBe(true);
	});

	test("ranges ignore booleans and compound values", () => {
		expect(match_raw(true, { kind: "range", gte: 0 })).toBe(false);
		expect(match_raw([1], { kind: "range", gte: 0 })).toBe(false);
		expect(match_raw(5, { kind: "range", gte: false })).toBe(false);
	});
});

describe("compare_text", () => {
	test("orders by code point rather than UTF-16 unit", () => {
		expect(compare_text("\u{1f600}", "\uff01")).toBe(1);
		expect(compare_text("\uff01", "\u{1f600}")).toBe(-1);
		expect(compare_text("a", "b")).toBe(-1);
	});

	test("puts a prefix first", () => {
		expect(compare_text("a", "ab")).toBe(-1);
		expect(compare_text("ab", "a")).toBe(1);
		expect(compare_text("\u{1f600}", "\u{1f600}")).toBe(0);
		expect(compare_text("", "")).toBe(0);
	});
});
