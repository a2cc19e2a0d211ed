import type { Definition, List, PhrasingContent, Root, RootContent, Table } from "mdast";
import { visit } from "unist-util-visit";
import { trailingSentinels } from "./sentinels.js";
import type {
  BlockNode,
  ColumnAlignment,
  InlineNode,
  ListItem,
  TaskListItem,
} from "./types.js";

/**
 * Maps an mdast tree onto the block/inline model.
 *
 * - soft line endings inside mdast text become `softBreak` nodes
 * - link and image references resolve through the document's definitions
 * - definitions, footnote definitions and front matter produce no block
 */
export function mdastToBlocks(root: Root): BlockNode[] {
  const context: ConversionContext = { definitions: collectDefinitions(root) };
  return convertBlocks(root.children, context);
}

interface ConversionContext {
  definitions: Map<string, Definition>;
}

function collectDefinitions(root: Root): Map<string, Definition> {
  const definitions = new Map<string, Definition>();
  visit(root, "definition", (node) => {
    // First definition of a label wins.
    if (!definitions.has(node.identifier)) {
      definitions.set(node.identifier, node);
    }
  });
  return definitions;
}

// ─── Blocks ──────────────────────────────────────────────────────

function convertBlocks(nodes: RootContent[], context: ConversionContext): BlockNode[] {
  return nodes.flatMap((node) => convertBlock(node, context));
}

function convertBlock(node: RootContent, context: ConversionContext): BlockNode[] {
  switch (node.type) {
    case "blockquote":
      return [{ type: "blockquote", children: convertBlocks(node.children, context) }];
    case "list":
      return [convertList(node, context)];
    case "paragraph":
      return [{ type: "paragraph", children: convertInlines(node.children, context) }];
    case "heading":
      return [
        {
          type: "heading",
          level: node.depth,
          children: convertInlines(node.children, context),
        },
      ];
    case "code": {
      const info = [node.lang, node.meta].filter((part) => part).join(" ");
      return [
        info
          ? { type: "codeBlock", info, value: node.value }
          : { type: "codeBlock", value: node.value },
      ];
    }
    case "html":
      return [{ type: "htmlBlock", value: node.value }];
    case "table":
      return [convertTable(node, context)];
    case "thematicBreak":
      return [{ type: "thematicBreak" }];
    default:
      return [];
  }
}

function convertList(node: List, context: ConversionContext): BlockNode {
  const tight = !node.spread;

  if (node.ordered) {
    return {
      type: "numberedList",
      tight,
      start: node.start ?? 1,
      items: node.children.map(
        (item): ListItem => ({ children: convertBlocks(item.children, context) }),
      ),
    };
  }

  if (node.children.some((item) => typeof item.checked === "boolean")) {
    return {
      type: "taskList",
      tight,
      items: node.children.map(
        (item): TaskListItem => ({
          checked: item.checked === true,
          children: convertBlocks(item.children, context),
        }),
      ),
    };
  }

  return {
    type: "bulletedList",
    tight,
    items: node.children.map(
      (item): ListItem => ({ children: convertBlocks(item.children, context) }),
    ),
  };
}

function convertTable(node: Table, context: ConversionContext): BlockNode {
  return {
    type: "table",
    alignments: (node.align ?? []).map((align): ColumnAlignment => align ?? "none"),
    rows: node.children.map((row) => ({
      cells: row.children.map((cell) => ({ children: convertInlines(cell.children, context) })),
    })),
  };
}

// ─── Inlines ─────────────────────────────────────────────────────

function convertInlines(nodes: PhrasingContent[], context: ConversionContext): InlineNode[] {
  return nodes.flatMap((node) => convertInline(node, context));
}

function convertInline(node: PhrasingContent, context: ConversionContext): InlineNode[] {
  switch (node.type) {
    case "text":
      return splitSoftBreaks(node.value);
    case "break":
      return [{ type: "lineBreak" }];
    case "inlineCode":
      return [{ type: "code", value: node.value }];
    case "html":
      return [{ type: "html", value: node.value }];
    case "emphasis":
      return [{ type: "emphasis", children: convertInlines(node.children, context) }];
    case "strong":
      return [{ type: "strong", children: convertInlines(node.children, context) }];
    case "delete":
      return [{ type: "strikethrough", children: convertInlines(node.children, context) }];
    case "link":
      return detachTrailingSentinels(node.url, convertInlines(node.children, context));
    case "linkReference": {
      const children = convertInlines(node.children, context);
      const definition = context.definitions.get(node.identifier);
      return definition ? [{ type: "link", destination: definition.url, children }] : children;
    }
    case "image":
      return [{ type: "image", source: node.url, children: splitSoftBreaks(node.alt ?? "") }];
    case "imageReference": {
      const definition = context.definitions.get(node.identifier);
      const children = splitSoftBreaks(node.alt ?? "");
      return definition ? [{ type: "image", source: definition.url, children }] : children;
    }
    case "footnoteReference":
      return [{ type: "text", value: `[^${node.label ?? node.identifier}]` }];
    default:
      return [];
  }
}

/**
 * A bare URL autolink runs on through any sentinel that follows it, so
 * `==https://example.com==` would swallow the closing marker. When the
 * destination and the link text end in the same sentinel run, that run is
 * moved back out of the link.
 */
function detachTrailingSentinels(url: string, children: InlineNode[]): InlineNode[] {
  const tail = trailingSentinels(url);
  const [only] = children;
  if (
    tail === "" ||
    children.length !== 1 ||
    only?.type !== "text" ||
    only.value.length <= tail.length ||
    !only.value.endsWith(tail)
  ) {
    return [{ type: "link", destination: url, children }];
  }
  return [
    {
      type: "link",
      destination: url.slice(0, -tail.length),
      children: [{ type: "text", value: only.value.slice(0, -tail.length) }],
    },
    { type: "text", value: tail },
  ];
}

function splitSoftBreaks(value: string): InlineNode[] {
  const nodes: InlineNode[] = [];
  value.split(/\r\n|\r|\n/).forEach((line, index) => {
    if (index > 0) {
      nodes.push({ type: "softBreak" });
    }
    if (line) {
      nodes.push({ type: "text", value: line });
    }
  });
  return nodes;
}
