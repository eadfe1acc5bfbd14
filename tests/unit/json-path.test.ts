import { describe, test, expect } from "vitest";
import { extract, parse_path } from "../../json-path";

describe("parse_path", () => {
	test("parses dotted properties", () => {
		expect(parse_path("$.customer.country")).toEqual({ ok: true, value: ["customer", "country"] });
	});

	test("parses array indices", () => {
		expect(parse_path("$.items[0].sku")).toEqual({ ok: true, value: ["items", 0, "sku"] });
		expect(parse_path("$.grid[1][2]")).toEqual({ ok: true, value: ["grid", 1, 2] });
	});

	test("accepts the root path", () => {
		expect(parse_path("$")).toEqual({ ok: true, value: [] });
	});

	test("rejects paths without the $. prefix", () => {
		expect(parse_path("status")).toEqual({
			ok: false,
			error: { kind: "invalid_path", path: "status", message: 'path must start with "$."' },
		});
	});

	test("rejects empty and malformed segments", () => {
		const empty = parse_path("$.a..b");
		expect(empty.ok).toBe(false);
		if (empty.ok) return;
		expect(empty.error).toEqual({ kind: "invalid_path", path: "$.a..b", message: 'invalid segment ""' });

		const bracket = parse_path("$.items[x]");
		expect(bracket.ok).toBe(false);
	});
});

describe("extract", () => {
	const doc = { id: "o1", customer: { country: "IN" }, items: [{ sku: "A1" }, { sku: "A2" }], note: null };

	test("reads nested values", () => {
		expect(extract(doc, "$.customer.country")).toEqual({ ok: true, value: "IN" });
		expect(extract(doc, "$.items[1].sku")).toEqual({ ok: true, value: "A2" });
	});

	test("returns undefined for paths that do not resolve", () => {
		expect(extract(doc, "$.customer.city")).toEqual({ ok: true, value: undefined });
		expect(extract(doc, "$.items[5].sku")).toEqual({ ok: true, value: undefined });
		expect(extract(doc, "$.id.length")).toEqual({ ok: true, value: undefined });
	});

	test("keeps explicit nulls", () => {
		expect(extract(doc, "$.note")).toEqual({ ok: true, value: null });
	});

	test("does not read inherited properties", () => {
		expect(extract(doc, "$.constructor")).toEqual({ ok: true, value: undefined });
	});
});
