import { describe, expect, it } from "vitest";
import { CRITIC_SPANS, HIGHLIGHT_SPAN, MATH_SPAN } from "../src/restore.js";
import { SENTINELS as S } from "../src/sentinels.js";
import { restoreSpans } from "../src/spans.js";
import type { InlineNode } from "../src/types.js";

const text = (value: string): InlineNode => ({ type: "text", value });

function collectWarnings(): { warnings: string[]; onWarning: (message: string) => void } {
  const warnings: string[] = [];
  return { warnings, onWarning: (message) => warnings.push(message) };
}

describe("restoreSpans", () => {
  it("collects a span across sibling nodes", () => {
    const link: InlineNode = { type: "link", destination: "u", children: [text("b")] };
    expect(
      restoreSpans(
        [text(`x ${S.highlightOpen}a `), link, text(` c${S.highlightClose} y`)],
        [HIGHLIGHT_SPAN],
      ),
    ).toEqual([
      text("x "),
      { type: "highlight", children: [text("a "), link, text(" c")] },
      text(" y"),
    ]);
  });

  it("restores spans inside containers", () => {
    expect(
      restoreSpans(
        [{ type: "emphasis", children: [text(`${S.highlightOpen}a${S.highlightClose}`)] }],
        [HIGHLIGHT_SPAN],
      ),
    ).toEqual([{ type: "emphasis", children: [{ type: "highlight", children: [text("a")] }] }]);
  });

  it("splits a substitution at its separator", () => {
    expect(
      restoreSpans(
        [text(`${S.substitutionOpen}old${S.substitutionSeparator}new${S.substitutionClose}`)],
        CRITIC_SPANS,
      ),
    ).toEqual([
      { type: "criticSubstitution", oldChildren: [text("old")], newChildren: [text("new")] },
    ]);
  });

  it("nests different kinds", () => {
    expect(
      restoreSpans(
        [text(`${S.additionOpen}a ${S.commentOpen}why${S.commentClose}${S.additionClose}`)],
        CRITIC_SPANS,
      ),
    ).toEqual([
      {
        type: "criticAddition",
        children: [text("a "), { type: "criticComment", children: [text("why")] }],
      },
    ]);
  });

  it("builds math from the plain text of its content", () => {
    expect(restoreSpans([text(`${S.mathOpen}x+1${S.mathClose}`)], [MATH_SPAN])).toEqual([
      { type: "math", value: "x+1" },
    ]);
  });

  it("spells out an unterminated span and merges the text around it", () => {
    const { warnings, onWarning } = collectWarnings();
    expect(restoreSpans([text(`a ${S.highlightOpen}b`), text(" c")], [HIGHLIGHT_SPAN], onWarning)).toEqual([
      text("a ==b c"),
    ]);
    expect(warnings).toEqual(["unterminated highlight span kept as literal text"]);
  });

  it("spells out a stray closing marker", () => {
    const { warnings, onWarning } = collectWarnings();
    expect(restoreSpans([text(`a${S.highlightClose}b`)], [HIGHLIGHT_SPAN], onWarning)).toEqual([
      text("a==b"),
    ]);
    expect(warnings).toEqual(["stray highlight closing marker kept as literal text"]);
  });

  it("spells out a substitution without a separator", () => {
    const { warnings, onWarning } = collectWarnings();
    expect(
      restoreSpans([text(`${S.substitutionOpen}x${S.substitutionClose}`)], CRITIC_SPANS, onWarning),
    ).toEqual([text("{~~x~~}")]);
    expect(warnings).toEqual(["malformed substitution span kept as literal text"]);
  });

  it("spells out a stray separator", () => {
    expect(restoreSpans([text(`a${S.substitutionSeparator}b`)], CRITIC_SPANS)).toEqual([
      text("a~>b"),
    ]);
  });

  it("unwinds a span that a closing marker skips over", () => {
    const { warnings, onWarning } = collectWarnings();
    expect(
      restoreSpans(
        [text(`${S.additionOpen}a${S.highlightOpen}b${S.additionClose}c${S.highlightClose}`)],
        [...CRITIC_SPANS, HIGHLIGHT_SPAN],
        onWarning,
      ),
    ).toEqual([{ type: "criticAddition", children: [text("a==b")] }, text("c==")]);
    expect(warnings).toEqual([
      "highlight span left open inside addition span kept as literal text",
      "stray highlight closing marker kept as literal text",
    ]);
  });

  it("does not mutate its input", () => {
    const input: InlineNode[] = [
      text("a"),
      text(`${S.highlightOpen}b${S.highlightClose}`),
      { type: "strong", children: [text("c")] },
    ];
    const before = structuredClone(input);
    restoreSpans(input, [HIGHLIGHT_SPAN]);
    expect(input).toEqual(before);
  });
});
