import { describe, expect, it } from "vitest";
import { imageData, parseAltText } from "../src/image-data.js";
import { findSentinelLeaks, summarizeTree } from "../src/inspect.js";
import { parseExtendedMarkdown } from "../src/pipeline.js";
import { toPlainText } from "../src/plain-text.js";
import { SENTINELS } from "../src/sentinels.js";
import { blockTextDirection, detectTextDirection } from "../src/text-direction.js";
import { collectInlines } from "../src/traverse.js";
import type { BlockNode, InlineNode } from "../src/types.js";

const text = (value: string): InlineNode => ({ type: "text", value });

describe("toPlainText", () => {
  it("shows the accepted reading of suggested edits", () => {
    expect(
      toPlainText([
        text("a "),
        { type: "criticDeletion", children: [text("x")] },
        { type: "criticSubstitution", oldChildren: [text("b")], newChildren: [text("c")] },
        { type: "softBreak" },
        { type: "html", value: "<br>" },
        { type: "code", value: "d" },
        { type: "math", value: "e" },
        { type: "criticComment", children: [text("why")] },
        { type: "criticAddition", children: [{ type: "strong", children: [text("f")] }] },
      ]),
    ).toBe("a c def");
  });
});

describe("imageData", () => {
  const image: InlineNode = { type: "image", source: "a.png", children: [text("logo|100x50")] };

  it("splits width and height off the alt text", () => {
    expect(imageData(image)).toEqual({ source: "a.png", alt: "logo", width: 100, height: 50 });
  });

  it("reads the destination of a link around a single image", () => {
    expect(
      imageData({ type: "link", destination: "https://example.com", children: [image] }),
    ).toEqual({
      source: "a.png",
      alt: "logo",
      width: 100,
      height: 50,
      destination: "https://example.com",
    });
  });

  it("returns undefined for anything else", () => {
    expect(imageData(text("logo"))).toBeUndefined();
    expect(
      imageData({ type: "link", destination: "u", children: [image, text(" caption")] }),
    ).toBeUndefined();
  });

  it("keeps earlier pipes in the alt text", () => {
    expect(parseAltText("a|b|20")).toEqual({ alt: "a|b", width: 20 });
    expect(parseAltText("plain")).toEqual({ alt: "plain" });
    expect(parseAltText("wide|big")).toEqual({ alt: "wide|big" });
  });
});

describe("text direction", () => {
  it("follows the first strong character", () => {
    expect(detectTextDirection("שלום world")).toBe("rtl");
    expect(detectTextDirection("123 hello مرحبا")).toBe("ltr");
    expect(detectTextDirection("  مرحبا")).toBe("rtl");
  });

  it("defaults to left to right", () => {
    expect(detectTextDirection("123 !")).toBe("ltr");
    expect(detectTextDirection("")).toBe("ltr");
  });

  it("looks through nested blocks", () => {
    const block: BlockNode = {
      type: "callout",
      calloutType: "note",
      children: [{ type: "paragraph", children: [{ type: "code", value: "42" }, text(" مرحبا")] }],
    };
    expect(blockTextDirection(block)).toBe("rtl");
  });
});

describe("summarizeTree", () => {
  it("counts extension nodes across the document", () => {
    const tree = parseExtendedMarkdown(
      [
        "> [!tip] One",
        "> ==a== and ==b==",
        "",
        "> **Note**",
        "> {++x++} {--y--} {~~p~>q~~} {>>c<<} {==h==}",
        "",
        "- $m$ ![i|20](i.png) ![j](j.png)",
      ].join("\n"),
    );
    expect(summarizeTree(tree)).toEqual({
      callouts: { tip: 1, note: 1 },
      highlights: 2,
      additions: 1,
      deletions: 1,
      substitutions: 1,
      comments: 1,
      criticHighlights: 1,
      math: 1,
      sizedImages: 1,
    });
  });
});

describe("findSentinelLeaks", () => {
  it("reports every string field that still holds a sentinel", () => {
    const tree: BlockNode[] = [
      { type: "codeBlock", value: `a${SENTINELS.highlightOpen}` },
      {
        type: "paragraph",
        children: [
          { type: "link", destination: `u${SENTINELS.imageDivider}`, children: [text("ok")] },
        ],
      },
    ];
    expect(findSentinelLeaks(tree)).toEqual([
      { nodeType: "codeBlock", field: "value", value: `a${SENTINELS.highlightOpen}` },
      { nodeType: "link", field: "destination", value: `u${SENTINELS.imageDivider}` },
    ]);
  });

  it("finds nothing in a finalized tree", () => {
    expect(findSentinelLeaks(parseExtendedMarkdown("`==a==` ==b== {++c"))).toEqual([]);
  });
});

describe("collectInlines", () => {
  it("visits inlines inside containers, children first", () => {
    const tree = parseExtendedMarkdown("Some ==marked **bold**== text");
    expect(collectInlines(tree, (node) => node.type)).toEqual([
      "text",
      "text",
      "text",
      "strong",
      "highlight",
      "text",
    ]);
  });
});
