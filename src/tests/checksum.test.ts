// src/tests/checksum.test.ts
import { canonicalJson, checksum } from "../lib/checksum";

describe("Checksums", () => {
  it("should serialize objects with sorted keys and drop undefined fields", () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: undefined }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"z":1}]},"b":1}'
    );
  });

  it("should hash equal data to the same digest regardless of key order", () => {
    expect(checksum({ x: 1, y: [1, 2] })).toBe(checksum({ y: [1, 2], x: 1 }));
    expect(checksum({ x: 1 })).not.toBe(checksum({ x: 2 }));
    expect(checksum({ x: 1 })).toMatch(/^[0-9a-f]{64}$/);
  });
});
