import { describe, expect, it } from "vitest";
import {
    SerializationError,
    decodeJsonObject,
    decodeOptionalJsonObject,
    encodeJsonObject,
    toJsonObject,
    toStateDocument
} from "../src/index";

describe("encodeJsonObject", () => {
    it("serializes plain JSON objects", () => {
        expect(encodeJsonObject({ messages: ["hi"], step: 2, done: false, extra: null }, "state"))
            .toBe('{"messages":["hi"],"step":2,"done":false,"extra":null}');
    });

    it("names the path of a non-finite number", () => {
        expect(() => encodeJsonObject({ scores: [1, Number.NaN] }, "state")).toThrow(SerializationError);
        expect(() => encodeJsonObject({ scores: [1, Number.NaN] }, "state")).toThrow(/^state is not a JSON object: scores: /);
    });

    it("rejects values JSON would silently drop or reshape", () => {
        expect(() => encodeJsonObject({ at: new Date(0) }, "metadata")).toThrow(SerializationError);
        expect(() => encodeJsonObject({ missing: undefined }, "metadata")).toThrow(SerializationError);
        expect(() => encodeJsonObject(["not", "an", "object"], "state")).toThrow(SerializationError);
    });

    it("keeps own __proto__ keys", () => {
        const state = JSON.parse('{"__proto__":{"x":1},"a":2}');

        expect(encodeJsonObject(state, "state")).toBe('{"__proto__":{"x":1},"a":2}');
    });
});

describe("toJsonObject", () => {
    it("returns a detached copy", () => {
        const source = { nested: { items: [1, 2] } };

        const copy = toJsonObject(source, "state");
        source.nested.items.push(3);

        expect(copy).toEqual({ nested: { items: [1, 2] } });
    });

    it("copies own __proto__ keys as data", () => {
        const copy = toJsonObject(JSON.parse('{"__proto__":{"x":1},"a":2}'), "state");

        expect(Object.keys(copy)).toEqual(["__proto__", "a"]);
        expect(Object.getPrototypeOf(copy)).toBe(Object.prototype);
        expect(JSON.stringify(copy)).toBe('{"__proto__":{"x":1},"a":2}');
    });
});

describe("decodeJsonObject", () => {
    it("accepts text and already-parsed objects", () => {
        expect(decodeJsonObject('{"step":1}', "state")).toEqual({ step: 1 });
        expect(decodeJsonObject({ step: 1 }, "state")).toEqual({ step: 1 });
    });

    it("keeps own __proto__ keys of stored text", () => {
        const decoded = decodeJsonObject('{"__proto__":{"x":1},"a":2}', "state");

        expect(Object.keys(decoded)).toEqual(["__proto__", "a"]);
        expect(JSON.stringify(decoded)).toBe('{"__proto__":{"x":1},"a":2}');
    });

    it("reports malformed stored text", () => {
        expect(() => decodeJsonObject("{\"step\":", "state")).toThrow(/^Stored state is not valid JSON: /);
        expect(() => decodeJsonObject("[1,2]", "metadata")).toThrow(/^Stored metadata is not a JSON object/);
    });

    it("maps missing metadata to undefined", () => {
        expect(decodeOptionalJsonObject(null, "metadata")).toBeUndefined();
        expect(decodeOptionalJsonObject(undefined, "metadata")).toBeUndefined();
        expect(decodeOptionalJsonObject("{}", "metadata")).toEqual({});
    });
});

describe("toStateDocument", () => {
    const createdAt = new Date("2026-01-01T00:00:00.000Z");
    const updatedAt = new Date("2026-01-02T00:00:00.000Z");

    it("builds a document and omits absent metadata", () => {
        const document = toStateDocument({
            threadId: "t1",
            checkpointId: "c1",
            state: '{"step":1}',
            metadata: null,
            createdAt,
            updatedAt
        });

        expect(document).toStrictEqual({ threadId: "t1", checkpointId: "c1", state: { step: 1 }, createdAt, updatedAt });
    });

    it("keeps empty metadata distinct from none", () => {
        const document = toStateDocument({
            threadId: "t1",
            checkpointId: "c1",
            state: {},
            metadata: {},
            createdAt,
            updatedAt
        });

        expect(document.metadata).toEqual({});
    });
});
