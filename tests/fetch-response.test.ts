import { messageSource, parseFetchResponses } from "../src";

describe("parseFetchResponses", () => {
	it("should measure literals in bytes", () => {
		const body = Buffer.from("Subject: café\r\n\r\nhi\r\n", "utf8");
		const text = Buffer.concat([
			Buffer.from(`* 1 FETCH (BODY[] {${body.length}}\r\n`),
			body,
			Buffer.from(")\r\n"),
		]).toString("latin1");

		const [record] = parseFetchResponses(text);

		expect(record.seq).toBe(1);
		expect(record.attributes.get("BODY[]")).toEqual(body);
		expect(messageSource(record)?.toString("utf8")).toBe("Subject: café\r\n\r\nhi\r\n");
	});

	it("should decode numbers, flag lists and quoted strings", () => {
		const text =
			'* 2 FETCH (UID 7 RFC822.SIZE 1024 FLAGS (\\Seen \\Answered) INTERNALDATE "17-Jul-1996 02:44:25 -0700")\r\n';

		const [record] = parseFetchResponses(text);

		expect(record.seq).toBe(2);
		expect([...record.attributes.keys()]).toEqual(["UID", "RFC822.SIZE", "FLAGS", "INTERNALDATE"]);
		expect(record.attributes.get("UID")).toBe(7);
		expect(record.attributes.get("RFC822.SIZE")).toBe(1024);
		expect(record.attributes.get("FLAGS")).toEqual(["\\Seen", "\\Answered"]);
		expect(record.attributes.get("INTERNALDATE")).toBe("17-Jul-1996 02:44:25 -0700");
		expect(messageSource(record)).toBeNull();
	});

	it("should decode nested envelope lists with NIL", () => {
		const text =
			'* 1 FETCH (ENVELOPE ("Mon, 7 Feb 1994 21:52:25 -0800" "Hi" (("Fred" NIL "fred" "example.org")) NIL))\r\n';

		const [record] = parseFetchResponses(text);

		expect(record.attributes.get("ENVELOPE")).toEqual([
			"Mon, 7 Feb 1994 21:52:25 -0800",
			"Hi",
			[["Fred", null, "fred", "example.org"]],
			null,
		]);
	});

	it("should keep section specifiers in attribute names", () => {
		const text = "* 1 FETCH (BODY[HEADER.FIELDS (DATE FROM)] {5}\r\nab\r\nc)\r\n";

		const [record] = parseFetchResponses(text);

		expect([...record.attributes.keys()]).toEqual(["BODY[HEADER.FIELDS (DATE FROM)]"]);
		expect(record.attributes.get("BODY[HEADER.FIELDS (DATE FROM)]")).toEqual(Buffer.from("ab\r\nc"));
	});

	it("should unescape quoted strings", () => {
		const [record] = parseFetchResponses('* 1 FETCH (X-LABEL "a \\"b\\"")\r\n');

		expect(record.attributes.get("X-LABEL")).toBe('a "b"');
	});

	it("should skip other untagged responses", () => {
		const text = "* 3 EXISTS\r\n* 1 FETCH (UID 1)\r\n* 0 RECENT\r\n* 2 fetch (uid 2)\r\n3 OK FETCH completed\r\n";

		const records = parseFetchResponses(text);

		expect(records.map((r) => r.seq)).toEqual([1, 2]);
		expect(records[1].attributes.get("UID")).toBe(2);
	});

	it("should not look for responses inside a literal", () => {
		const body = "* 9 FETCH (UID 9)\r\n";
		const text = `* 1 FETCH (RFC822 {${body.length}}\r\n${body})\r\n`;

		const records = parseFetchResponses(text);

		expect(records).toHaveLength(1);
		expect(messageSource(records[0])?.toString()).toBe(body);
	});

	it("should accept an item name without a value", () => {
		const [record] = parseFetchResponses("* 1 FETCH (RFC822)\r\n");

		expect(record.attributes.get("RFC822")).toBeNull();
		expect(messageSource(record)).toBeNull();
	});

	it("should report and skip responses that cannot be decoded", () => {
		const onError = jest.fn();
		const text = "* 1 FETCH (FLAGS (\\Seen)\r\n* 2 FETCH (UID 2)\r\n";

		const records = parseFetchResponses(text, onError);

		expect(records.map((r) => r.seq)).toEqual([2]);
		expect(onError).toHaveBeenCalledTimes(1);
		expect(onError.mock.calls[0][0].message).toMatch(/^Malformed FETCH response: expected attribute name/);
		expect(onError.mock.calls[0][1]).toBe(1);
	});

	it("should throw on a truncated literal", () => {
		expect(() => parseFetchResponses("* 1 FETCH (BODY[] {10}\r\nabc")).toThrow(
			"Malformed FETCH response: expected 10 byte literal"
		);
	});
});
