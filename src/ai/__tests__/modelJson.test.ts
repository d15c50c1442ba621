import { describe, it, expect } from "vitest";
import { parseModelJson } from "../modelJson";

describe("parseModelJson", () => {
  it("parses a bare object", () => {
    expect(parseModelJson('{"needs_improvement": false}')).toEqual({ needs_improvement: false });
  });

  it("strips a json code fence", () => {
    const text = '```json\n{"scenario": "At a cafe"}\n```';
    expect(parseModelJson(text)).toEqual({ scenario: "At a cafe" });
  });

  it("strips an untagged code fence", () => {
    expect(parseModelJson('```\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it("extracts the object from surrounding text", () => {
    expect(parseModelJson('Sure! Here it is: {"a": "b"} Enjoy.')).toEqual({ a: "b" });
  });

  it("returns null for non-objects and broken JSON", () => {
    expect(parseModelJson("")).toBeNull();
    expect(parseModelJson("no json here")).toBeNull();
    expect(parseModelJson('{"a": }')).toBeNull();
    expect(parseModelJson("[1, 2]")).toBeNull();
  });
});
