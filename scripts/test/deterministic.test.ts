import { describe, expect, it } from "vitest";

import {
  computeSha256,
  ensureLf,
  ensureTrailingNewline,
  normalizeForOutput,
  stringifyDeterministic,
} from "../src/report/deterministic.js";

describe("normalizeForOutput", () => {
  it("sorts keys, drops undefined values and nulls non-finite numbers", () => {
    const normalized = normalizeForOutput({
      zeta: 1,
      alpha: { keep: Number.POSITIVE_INFINITY, drop: undefined },
      tags: new Set(["rock", "ambient"]),
      order: ["b", "a"],
    });

    expect(normalized).toEqual({
      alpha: { keep: null },
      order: ["b", "a"],
      tags: ["ambient", "rock"],
      zeta: 1,
    });
    expect(JSON.stringify(normalized)).toBe(
      '{"alpha":{"keep":null},"order":["b","a"],"tags":["ambient","rock"],"zeta":1}'
    );
  });
});

describe("stringify utilities", () => {
  it("produces stable YAML with sorted keys", () => {
    expect(stringifyDeterministic({ beta: 2, alpha: 1 })).toBe("alpha: 1\nbeta: 2\n");
  });

  it("enforces LF endings and a trailing newline", () => {
    expect(ensureLf("a\r\nb")).toBe("a\nb");
    expect(ensureTrailingNewline("abc")).toBe("abc\n");
    expect(ensureTrailingNewline("abc\n")).toBe("abc\n");
  });

  it("hashes content as hex sha256", () => {
    expect(computeSha256("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });
});
