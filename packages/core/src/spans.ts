import { literalFor } from "./sentinels.js";
import { mapInlineChildren } from "./traverse.js";
import type { InlineNode } from "./types.js";

/**
 * One delimited inline syntax as the restorer sees it: sentinel characters
 * for its open and close markers (and, for substitutions, a separator), and
 * a builder for the node that replaces a complete span.
 */
export interface SpanRule {
  /** Used in warning messages. */
  name: string;
  open: string;
  close: string;
  separator?: string;
  /**
   * `head` holds the content before the separator when the rule has one.
   * Returning `undefined` rejects the span, which is then kept as literal
   * text.
   */
  build(children: InlineNode[], head: InlineNode[] | undefined): InlineNode | undefined;
}

interface Frame {
  rule: SpanRule;
  children: InlineNode[];
  head?: InlineNode[];
}

type MarkerRole = "open" | "close" | "separator";

interface Marker {
  rule: SpanRule;
  role: MarkerRole;
}

/**
 * Rewrites sentinel-delimited spans of an inline sequence into typed nodes.
 *
 * The sequence is read left to right with a stack of open spans. Text before
 * an open marker stays where it is; everything after it, split text and
 * parser-made containers alike, is collected into the span until its close
 * marker shows up, possibly several siblings later. Containers are restored
 * on their own first, so spans never cross a container boundary.
 *
 * Degradations, each reported through `onWarning`:
 * - an open marker never closed is re-emitted as its literal delimiter
 *   followed by the collected content
 * - a close marker with no open span becomes its literal delimiter
 * - a close marker that skips over other open spans unwinds those first
 * - a span its rule rejects is spelled out literally
 */
export function restoreSpans(
  inlines: InlineNode[],
  rules: SpanRule[],
  onWarning?: (message: string) => void,
): InlineNode[] {
  const markers = markerTable(rules);
  return new SpanScanner(markers, onWarning).run(inlines);
}

function markerTable(rules: SpanRule[]): Map<string, Marker> {
  const markers = new Map<string, Marker>();
  for (const rule of rules) {
    markers.set(rule.open, { rule, role: "open" });
    markers.set(rule.close, { rule, role: "close" });
    if (rule.separator !== undefined) {
      markers.set(rule.separator, { rule, role: "separator" });
    }
  }
  return markers;
}

class SpanScanner {
  private readonly output: InlineNode[] = [];
  private readonly stack: Frame[] = [];

  constructor(
    private readonly markers: Map<string, Marker>,
    private readonly onWarning: ((message: string) => void) | undefined,
  ) {}

  run(inlines: InlineNode[]): InlineNode[] {
    for (const node of inlines) {
      if (node.type === "text") {
        this.scanText(node.value);
      } else {
        const restored = mapInlineChildren(node, (children) =>
          new SpanScanner(this.markers, this.onWarning).run(children),
        );
        appendNode(this.target(), restored);
      }
    }

    let frame = this.stack.pop();
    while (frame) {
      this.warn(`unterminated ${frame.rule.name} span kept as literal text`);
      this.spellOut(frame);
      frame = this.stack.pop();
    }
    return this.output;
  }

  private scanText(value: string): void {
    let start = 0;
    for (let index = 0; index < value.length; index += 1) {
      const char = value.charAt(index);
      const marker = this.markers.get(char);
      if (!marker) {
        continue;
      }
      appendText(this.target(), value.slice(start, index));
      start = index + 1;
      this.handle(marker, char);
    }
    appendText(this.target(), value.slice(start));
  }

  private handle(marker: Marker, char: string): void {
    switch (marker.role) {
      case "open":
        this.stack.push({ rule: marker.rule, children: [] });
        return;
      case "separator":
        this.separate(marker, char);
        return;
      case "close":
        this.close(marker, char);
        return;
    }
  }

  private separate(marker: Marker, char: string): void {
    const top = this.stack[this.stack.length - 1];
    if (top && top.rule === marker.rule && top.head === undefined) {
      top.head = top.children;
      top.children = [];
      return;
    }
    this.warn(`stray ${marker.rule.name} separator kept as literal text`);
    appendText(this.target(), literalFor(char));
  }

  private close(marker: Marker, char: string): void {
    const depth = this.findOpenFrame(marker.rule);
    if (depth === -1) {
      this.warn(`stray ${marker.rule.name} closing marker kept as literal text`);
      appendText(this.target(), literalFor(char));
      return;
    }

    while (this.stack.length > depth + 1) {
      const inner = this.stack.pop();
      if (inner) {
        this.warn(`${inner.rule.name} span left open inside ${marker.rule.name} span kept as literal text`);
        this.spellOut(inner);
      }
    }

    const frame = this.stack.pop();
    if (!frame) {
      return;
    }
    const built = frame.rule.build(frame.children, frame.head);
    if (built) {
      appendNode(this.target(), built);
      return;
    }
    this.warn(`malformed ${frame.rule.name} span kept as literal text`);
    this.spellOut(frame);
    appendText(this.target(), literalFor(char));
  }

  private findOpenFrame(rule: SpanRule): number {
    for (let index = this.stack.length - 1; index >= 0; index -= 1) {
      if (this.stack[index]?.rule === rule) {
        return index;
      }
    }
    return -1;
  }

  /** Emits a popped frame's delimiters and content as plain nodes. */
  private spellOut(frame: Frame): void {
    const target = this.target();
    appendText(target, literalFor(frame.rule.open));
    if (frame.head !== undefined && frame.rule.separator !== undefined) {
      appendAll(target, frame.head);
      appendText(target, literalFor(frame.rule.separator));
    }
    appendAll(target, frame.children);
  }

  private target(): InlineNode[] {
    const top = this.stack[this.stack.length - 1];
    return top ? top.children : this.output;
  }

  private warn(message: string): void {
    this.onWarning?.(message);
  }
}

// ─── Accumulation ────────────────────────────────────────────────

function appendText(target: InlineNode[], value: string): void {
  appendNode(target, { type: "text", value });
}

function appendAll(target: InlineNode[], nodes: InlineNode[]): void {
  for (const node of nodes) {
    appendNode(target, node);
  }
}

/** Appends while merging adjacent text and dropping empty text. */
function appendNode(target: InlineNode[], node: InlineNode): void {
  if (node.type !== "text") {
    target.push(node);
    return;
  }
  if (!node.value) {
    return;
  }
  const last = target[target.length - 1];
  if (last?.type === "text") {
    target[target.length - 1] = { type: "text", value: last.value + node.value };
    return;
  }
  target.push(node);
}
