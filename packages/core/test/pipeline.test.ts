import { describe, expect, it } from "vitest";
import { parseMarkdownBlocks } from "../src/parser.js";
import {
  DEFAULT_SETTINGS,
  finalizeTree,
  parseExtendedMarkdown,
  prepareForParsing,
} from "../src/pipeline.js";
import { findSentinelLeaks } from "../src/inspect.js";
import { revealSentinels, SENTINELS } from "../src/sentinels.js";
import type { BlockNode, InlineNode } from "../src/types.js";

const text = (value: string): InlineNode => ({ type: "text", value });

function paragraphInlines(source: string): InlineNode[] {
  const [first] = parseExtendedMarkdown(source);
  if (first?.type !== "paragraph") {
    throw new Error(`expected a paragraph, got ${first?.type ?? "nothing"}`);
  }
  return first.children;
}

describe("highlight", () => {
  it("restores a simple highlight", () => {
    expect(paragraphInlines("Hello ==world==.")).toEqual([
      text("Hello "),
      { type: "highlight", children: [text("world")] },
      text("."),
    ]);
  });

  it("reassembles a highlight the parser split around bold text", () => {
    expect(paragraphInlines("This has ==highlighted **bold** text== here.")).toEqual([
      text("This has "),
      {
        type: "highlight",
        children: [text("highlighted "), { type: "strong", children: [text("bold")] }, text(" text")],
      },
      text(" here."),
    ]);
  });

  it("keeps two highlights on one line separate", () => {
    expect(paragraphInlines("==first== and ==second==")).toEqual([
      { type: "highlight", children: [text("first")] },
      text(" and "),
      { type: "highlight", children: [text("second")] },
    ]);
  });

  it("keeps a bare URL from running into the closing marker", () => {
    expect(paragraphInlines("==https://example.com== x")).toEqual([
      {
        type: "highlight",
        children: [
          {
            type: "link",
            destination: "https://example.com",
            children: [text("https://example.com")],
          },
        ],
      },
      text(" x"),
    ]);
  });

  it("applies asterisk emphasis inside a highlight", () => {
    expect(paragraphInlines("==*it*==")).toEqual([
      { type: "highlight", children: [{ type: "emphasis", children: [text("it")] }] },
    ]);
    expect(paragraphInlines("==a _b_ c==")).toEqual([
      {
        type: "highlight",
        children: [text("a "), { type: "emphasis", children: [text("b")] }, text(" c")],
      },
    ]);
  });

  it("keeps underscores that touch the markers literal", () => {
    expect(paragraphInlines("==_it_==")).toEqual([
      { type: "highlight", children: [text("_it_")] },
    ]);
  });

  it("degrades a highlight broken by bold text to literal delimiters", () => {
    const warnings: string[] = [];
    const [paragraph] = parseExtendedMarkdown("**==a** b==", {
      onWarning: (message) => warnings.push(message),
    });
    expect(paragraph).toEqual({
      type: "paragraph",
      children: [{ type: "strong", children: [text("==a")] }, text(" b==")],
    });
    expect(warnings).toEqual([
      "unterminated highlight span kept as literal text",
      "stray highlight closing marker kept as literal text",
    ]);
  });
});

describe("CriticMarkup", () => {
  it("restores a substitution between its neighbours", () => {
    expect(paragraphInlines("Replace {~~old~>new~~} text.")).toEqual([
      text("Replace "),
      { type: "criticSubstitution", oldChildren: [text("old")], newChildren: [text("new")] },
      text(" text."),
    ]);
  });

  it("keeps formatting inside an addition", () => {
    expect(paragraphInlines("{++**bold** add++}")).toEqual([
      {
        type: "criticAddition",
        children: [{ type: "strong", children: [text("bold")] }, text(" add")],
      },
    ]);
  });

  it("restores the remaining kinds", () => {
    expect(paragraphInlines("{--cut--} {>>note<<} {==mark==}")).toEqual([
      { type: "criticDeletion", children: [text("cut")] },
      text(" "),
      { type: "criticComment", children: [text("note")] },
      text(" "),
      { type: "criticHighlight", children: [text("mark")] },
    ]);
  });
});

describe("inline math", () => {
  it("keeps the expression verbatim", () => {
    expect(paragraphInlines("Euler: $e^{i\\pi} + 1 = 0$")).toEqual([
      text("Euler: "),
      { type: "math", value: "e^{i\\pi} + 1 = 0" },
    ]);
  });

  it("stays literal when the closing dollar is escaped", () => {
    expect(paragraphInlines("$a\\$b$ c")).toEqual([text("$a$b$ c")]);
  });

  it("does not read underscores inside math as emphasis", () => {
    expect(paragraphInlines("$a_1 + b_2$")).toEqual([{ type: "math", value: "a_1 + b_2" }]);
  });
});

describe("image dimensions", () => {
  it("survives inside a table cell", () => {
    const [table] = parseExtendedMarkdown("| img |\n| --- |\n| ![logo|100x50](a.png) |");
    expect(table).toEqual({
      type: "table",
      alignments: ["none"],
      rows: [
        { cells: [{ children: [text("img")] }] },
        {
          cells: [
            {
              children: [{ type: "image", source: "a.png", children: [text("logo|100x50")] }],
            },
          ],
        },
      ],
    });
  });
});

describe("callouts", () => {
  it("rewrites a marker-style blockquote", () => {
    expect(parseExtendedMarkdown("> [!warning] Be Careful\n> This is important")).toEqual([
      {
        type: "callout",
        calloutType: "warning",
        title: "Be Careful",
        children: [{ type: "paragraph", children: [text("This is important")] }],
      },
    ]);
  });

  it("rewrites a label-style blockquote", () => {
    expect(parseExtendedMarkdown("> **Warning**\n> Be careful")).toEqual([
      {
        type: "callout",
        calloutType: "warning",
        children: [{ type: "paragraph", children: [text("Be careful")] }],
      },
    ]);
  });

  it("restores inline syntax inside callout bodies and titles", () => {
    expect(parseExtendedMarkdown("> [!note] A ==big== deal\n> with ==this==")).toEqual([
      {
        type: "callout",
        calloutType: "note",
        title: "A ==big== deal",
        children: [
          {
            type: "paragraph",
            children: [text("with "), { type: "highlight", children: [text("this")] }],
          },
        ],
      },
    ]);
  });
});

describe("code", () => {
  it("leaves extension syntax in inline code untouched", () => {
    expect(paragraphInlines("Use `{++x++}` and ==y==")).toEqual([
      text("Use "),
      { type: "code", value: "{++x++}" },
      text(" and "),
      { type: "highlight", children: [text("y")] },
    ]);
  });

  it("leaves extension syntax in fenced code untouched", () => {
    expect(parseExtendedMarkdown("```\n{++a++} ==b== $c$\n```")).toEqual([
      { type: "codeBlock", value: "{++a++} ==b== $c$" },
    ]);
  });

  it("spells out sentinels that reach an indented code block", () => {
    expect(parseExtendedMarkdown("    ==a== $b_1$")).toEqual([
      { type: "codeBlock", value: "==a== $b_1$" },
    ]);
  });
});

describe("settings", () => {
  it("skips disabled syntaxes on both sides", () => {
    expect(paragraphInlines("==a== $b$")).toEqual([
      { type: "highlight", children: [text("a")] },
      text(" "),
      { type: "math", value: "b" },
    ]);

    const [paragraph] = parseExtendedMarkdown("==a== $b$", {
      settings: { highlight: false, math: false },
    });
    expect(paragraph).toEqual({ type: "paragraph", children: [text("==a== $b$")] });
  });

  it("leaves blockquotes alone when callouts are off", () => {
    const [block] = parseExtendedMarkdown("> [!note]\n> body", { settings: { callouts: false } });
    expect(block?.type).toBe("blockquote");
  });

  it("removes stray sentinels from the input by default", () => {
    expect(prepareForParsing(`a${SENTINELS.highlightClose}b`)).toBe("ab");
    expect(prepareForParsing(`a${SENTINELS.highlightClose}b`, { sanitize: "none" })).toBe(
      `a${SENTINELS.highlightClose}b`,
    );
  });

  it("defaults to every extension on", () => {
    expect(DEFAULT_SETTINGS).toEqual({
      highlight: true,
      critic_markup: true,
      math: true,
      image_dimensions: true,
      callouts: true,
      callout_labels: true,
      sanitize: "sentinels",
    });
  });
});

describe("pipeline properties", () => {
  const samples = [
    "Mix ==hi== {++add++} {~~a~>b~~} {--c--} {>>d<<} {==e==} $x_1$ ![i|10](u.png) `==code==`",
    "> [!tip] Title\n> - item with ==mark==\n> - {++new\nline++}",
    "| a | b |\n| - | - |\n| ![x|20x30](y.png) | $\\alpha$ |",
    "**==broken** span== and ~~strike~~ {~~no separator~~}",
  ];

  it("reveals every shielded string back to its source", () => {
    for (const sample of samples) {
      expect(revealSentinels(prepareForParsing(sample))).toBe(sample);
    }
  });

  it("leaves no sentinel in the final tree", () => {
    for (const sample of samples) {
      expect(findSentinelLeaks(parseExtendedMarkdown(sample))).toEqual([]);
    }
  });

  it("is idempotent", () => {
    for (const sample of samples) {
      const once = finalizeTree(parseMarkdownBlocks(prepareForParsing(sample)));
      expect(finalizeTree(once)).toEqual(once);
    }
  });

  it("does not mutate the parsed tree", () => {
    const parsed: BlockNode[] = parseMarkdownBlocks(prepareForParsing(samples[0] ?? ""));
    const before = structuredClone(parsed);
    finalizeTree(parsed);
    expect(parsed).toEqual(before);
  });
});
