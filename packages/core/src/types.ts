// ─── Inline nodes ────────────────────────────────────────────────

export interface TextNode {
  type: "text";
  value: string;
}

export interface SoftBreakNode {
  type: "softBreak";
}

export interface LineBreakNode {
  type: "lineBreak";
}

export interface CodeNode {
  type: "code";
  value: string;
}

export interface HtmlNode {
  type: "html";
  value: string;
}

/** Raw expression between `$` delimiters, without the delimiters. */
export interface MathNode {
  type: "math";
  value: string;
}

export interface EmphasisNode {
  type: "emphasis";
  children: InlineNode[];
}

export interface StrongNode {
  type: "strong";
  children: InlineNode[];
}

export interface StrikethroughNode {
  type: "strikethrough";
  children: InlineNode[];
}

/** `==text==` */
export interface HighlightNode {
  type: "highlight";
  children: InlineNode[];
}

export interface LinkNode {
  type: "link";
  destination: string;
  children: InlineNode[];
}

/** Alt text lives in `children`, as the parser produced it. */
export interface ImageNode {
  type: "image";
  source: string;
  children: InlineNode[];
}

/** `{++text++}` */
export interface CriticAdditionNode {
  type: "criticAddition";
  children: InlineNode[];
}

/** `{--text--}` */
export interface CriticDeletionNode {
  type: "criticDeletion";
  children: InlineNode[];
}

/** `{~~old~>new~~}` */
export interface CriticSubstitutionNode {
  type: "criticSubstitution";
  oldChildren: InlineNode[];
  newChildren: InlineNode[];
}

/** `{>>text<<}` */
export interface CriticCommentNode {
  type: "criticComment";
  children: InlineNode[];
}

/** `{==text==}` */
export interface CriticHighlightNode {
  type: "criticHighlight";
  children: InlineNode[];
}

export type InlineLeaf = TextNode | SoftBreakNode | LineBreakNode | CodeNode | HtmlNode | MathNode;

export type InlineContainer =
  | EmphasisNode
  | StrongNode
  | StrikethroughNode
  | HighlightNode
  | LinkNode
  | ImageNode
  | CriticAdditionNode
  | CriticDeletionNode
  | CriticSubstitutionNode
  | CriticCommentNode
  | CriticHighlightNode;

export type InlineNode = InlineLeaf | InlineContainer;

// ─── Block nodes ─────────────────────────────────────────────────

export type ColumnAlignment = "none" | "left" | "center" | "right";

export interface ListItem {
  children: BlockNode[];
}

export interface TaskListItem {
  checked: boolean;
  children: BlockNode[];
}

export interface TableCell {
  children: InlineNode[];
}

export interface TableRow {
  cells: TableCell[];
}

export interface BlockquoteNode {
  type: "blockquote";
  children: BlockNode[];
}

export interface CalloutNode {
  type: "callout";
  /** Lower-cased identifier; may be outside the known catalogue. */
  calloutType: string;
  title?: string;
  children: BlockNode[];
}

export interface BulletedListNode {
  type: "bulletedList";
  tight: boolean;
  items: ListItem[];
}

export interface NumberedListNode {
  type: "numberedList";
  tight: boolean;
  start: number;
  items: ListItem[];
}

export interface TaskListNode {
  type: "taskList";
  tight: boolean;
  items: TaskListItem[];
}

export interface ParagraphNode {
  type: "paragraph";
  children: InlineNode[];
}

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface HeadingNode {
  type: "heading";
  level: HeadingLevel;
  children: InlineNode[];
}

export interface CodeBlockNode {
  type: "codeBlock";
  info?: string;
  value: string;
}

export interface HtmlBlockNode {
  type: "htmlBlock";
  value: string;
}

/** The first row is the header row. */
export interface TableNode {
  type: "table";
  alignments: ColumnAlignment[];
  rows: TableRow[];
}

export interface ThematicBreakNode {
  type: "thematicBreak";
}

export type BlockNode =
  | BlockquoteNode
  | CalloutNode
  | BulletedListNode
  | NumberedListNode
  | TaskListNode
  | ParagraphNode
  | HeadingNode
  | CodeBlockNode
  | HtmlBlockNode
  | TableNode
  | ThematicBreakNode;

// ─── Pipeline ────────────────────────────────────────────────────

export interface ProtectResult {
  text: string;
  /** True when at least one span was shielded. */
  matched: boolean;
}

/**
 * How `prepareForParsing` cleans its input before shielding.
 * `sentinels` drops only the reserved code points, `private-use` drops the
 * whole U+E000–U+F8FF range.
 */
export type SanitizeMode = "sentinels" | "private-use" | "none";

export interface ExtensionSettings {
  highlight: boolean;
  critic_markup: boolean;
  math: boolean;
  image_dimensions: boolean;
  callouts: boolean;
  /** Also accept `> **Note**` style callouts. */
  callout_labels: boolean;
  sanitize: SanitizeMode;
}

export interface FinalizeOptions {
  settings?: Partial<ExtensionSettings>;
  /** Called once per degraded span (unterminated or stray marker). */
  onWarning?: (message: string) => void;
}

// ─── Configuration ───────────────────────────────────────────────

export interface ConfigOverride {
  pattern: string;
  extensions: Partial<ExtensionSettings>;
}

export interface MarkextConfig {
  version: "1";
  extensions?: Partial<ExtensionSettings>;
  overrides?: ConfigOverride[];
}
