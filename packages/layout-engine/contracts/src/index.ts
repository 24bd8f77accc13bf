export {
  FolioError,
  MarkupSyntaxError,
  MarkupBuildError,
  LayoutError,
  ShaperTimeoutError,
  type FolioErrorCode,
  type SyntaxErrorCode,
  type BuildErrorCode,
  type LayoutErrorCode,
} from './errors.js';

/** 1-based location in the markup source. */
export type SourcePosition = {
  line: number;
  column: number;
};

// ============================================================================
// Raw parse tree
// ============================================================================

/**
 * Bare word inside a `{...}` list. Either a builtin flag (`bold`, `mono`, ...)
 * or the name of a style from the document's style block.
 */
export type RawStyleWord = {
  kind: 'word';
  name: string;
  position: SourcePosition;
};

/** Parenthesized modifier with a single string argument, e.g. `(fg "00FF00")`. */
export type RawStyleCall = {
  kind: 'call';
  name: string;
  argument: string;
  position: SourcePosition;
};

export type RawStyleModifier = RawStyleWord | RawStyleCall;

export type RawList = {
  kind: 'list';
  /** Leading bare symbol. Absent for plain text lists. */
  head?: string;
  children: RawItem[];
  position: SourcePosition;
};

export type RawText = {
  kind: 'text';
  value: string;
  position: SourcePosition;
};

export type RawStyleList = {
  kind: 'styleList';
  modifiers: RawStyleModifier[];
  position: SourcePosition;
};

export type RawItem = RawList | RawText | RawStyleList;

/** One entry of the leading style block. */
export type RawStyleRule = {
  selector: string;
  modifiers: RawStyleModifier[];
  position: SourcePosition;
};

export type RawDocument = {
  styleRules: RawStyleRule[];
  items: RawItem[];
};

// ============================================================================
// Styles
// ============================================================================

export type FontFamily = 'serif' | 'sans' | 'mono';
export type FontWeight = 'normal' | 'bold';
export type Decoration = 'underline' | 'strike' | 'italic';

/** Colour in `#RRGGBB` form, upper case. */
export type RgbColor = string;

/**
 * Builtin item kinds a style can be resolved for. `text` covers explicit and
 * implicit text lists.
 */
export type StyledKind = 'text' | 'box' | 'vbox' | 'link' | 'binary';

export type Style = {
  fontFamily: FontFamily;
  weight: FontWeight;
  decorations: Decoration[];
  foreground: RgbColor;
  /** Transparent when absent. */
  background?: RgbColor;
  /** Font size in points. */
  size: number;
  /** Share of the parent's distributable space. Absent means content-sized. */
  fill?: number;
  /** Intrinsic size multiplier for binary references. */
  scale?: number;
};

/**
 * A single attribute assignment. Resolution applies an ordered list of patches
 * to the builtin default; the last patch touching an attribute wins.
 */
export type StylePatch =
  | { attribute: 'fontFamily'; value: FontFamily }
  | { attribute: 'weight'; value: FontWeight }
  | { attribute: 'decoration'; value: Decoration | 'none' }
  | { attribute: 'foreground'; value: RgbColor }
  | { attribute: 'background'; value: RgbColor | null }
  | { attribute: 'size'; value: number }
  | { attribute: 'fill'; value: number }
  | { attribute: 'scale'; value: number };

/** Read-only, document-scoped table of named style bodies. */
export type NamedStyleTable = ReadonlyMap<string, readonly RawStyleModifier[]>;

// ============================================================================
// Document tree
// ============================================================================

export type TextNode = {
  kind: 'text';
  content: string;
  style: Style;
};

export type BoxNode = {
  kind: 'box';
  children: DocumentNode[];
  style: Style;
};

export type VBoxNode = {
  kind: 'vbox';
  children: DocumentNode[];
  style: Style;
};

export type InlineNode = {
  kind: 'inline';
  children: DocumentNode[];
};

export type AnchorNode = {
  kind: 'anchor';
  name: string;
};

export type LinkNode = {
  kind: 'link';
  url: string;
  /** Display text. The URL is rendered when absent. */
  text?: string;
  style: Style;
};

export type BinaryNode = {
  kind: 'binary';
  name: string;
  style: Style;
  altText?: string;
};

export type DocumentNode = TextNode | BoxNode | VBoxNode | InlineNode | AnchorNode | LinkNode | BinaryNode;

export type Document = {
  root: VBoxNode;
  styles: NamedStyleTable;
  /** Anchor names in document order. */
  anchors: string[];
  /** Distinct binary reference names in first-use order. */
  binaryReferences: string[];
};

// ============================================================================
// Warnings
// ============================================================================

export type WarningCode =
  | 'UNKNOWN_STYLE_REFERENCE'
  | 'RECURSIVE_STYLE_REFERENCE'
  | 'INVALID_STYLE_ARGUMENT'
  | 'IGNORED_STYLE_LIST'
  | 'DUPLICATE_ANCHOR'
  | 'UNRESOLVED_BINARY_REFERENCE'
  | 'INVALID_FILL_RATIO'
  | 'ZERO_AVAILABLE_WIDTH';

/** Recoverable problem. The affected node degrades and the document still renders. */
export type LayoutWarning = {
  code: WarningCode;
  message: string;
  position?: SourcePosition;
  /** Layout node id, for warnings raised during layout. */
  nodeId?: string;
};

// ============================================================================
// Text shaping
// ============================================================================

export type FontDescriptor = {
  family: FontFamily;
  weight: FontWeight;
  italic: boolean;
  /** Size in pixels. */
  sizePx: number;
};

export type ShapedRun = {
  width: number;
  ascent: number;
  descent: number;
};

/**
 * External glyph shaping collaborator. Calls are synchronous; an implementation
 * backed by a slower service throws {@link ShaperTimeoutError} when it gives up.
 */
export interface TextShaper {
  measure(text: string, font: FontDescriptor): ShapedRun;
}

/** Intrinsic pixel dimensions of a decoded binary payload. */
export type IntrinsicSize = {
  width: number;
  height: number;
};

// ============================================================================
// Layout tree
// ============================================================================

export type LayoutRect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

/** One wrapped line of text, in absolute coordinates. */
export type LayoutLine = LayoutRect & {
  text: string;
};

type LayoutNodeBase = LayoutRect & {
  /** Child-index path from the root, e.g. `0.2.1`. */
  id: string;
};

export type LayoutTextNode = LayoutNodeBase & {
  kind: 'text';
  style: Style;
  font: FontDescriptor;
  lineHeight: number;
  lines: LayoutLine[];
};

export type LayoutLinkNode = LayoutNodeBase & {
  kind: 'link';
  url: string;
  text: string;
  style: Style;
  font: FontDescriptor;
  lineHeight: number;
  lines: LayoutLine[];
};

export type LayoutBinaryNode = LayoutNodeBase & {
  kind: 'binary';
  name: string;
  style: Style;
  /** False when the payload was missing; `lines` then hold the alt text. */
  resolved: boolean;
  image?: LayoutRect;
  altText: string;
  font: FontDescriptor;
  lineHeight: number;
  lines: LayoutLine[];
};

export type LayoutBoxNode = LayoutNodeBase & {
  kind: 'box';
  style: Style;
  contentHeight: number;
  children: LayoutNode[];
};

export type LayoutVBoxNode = LayoutNodeBase & {
  kind: 'vbox';
  style: Style;
  contentHeight: number;
  children: LayoutNode[];
};

export type LayoutInlineNode = LayoutNodeBase & {
  kind: 'inline';
  contentHeight: number;
  children: LayoutNode[];
};

export type LayoutAnchorNode = LayoutNodeBase & {
  kind: 'anchor';
  name: string;
};

/** Minimum-size stand-in for a subtree that had no width to lay out in. */
export type LayoutPlaceholderNode = LayoutNodeBase & {
  kind: 'placeholder';
  reason: 'ZERO_AVAILABLE_WIDTH';
};

export type LayoutNode =
  | LayoutTextNode
  | LayoutLinkNode
  | LayoutBinaryNode
  | LayoutBoxNode
  | LayoutVBoxNode
  | LayoutInlineNode
  | LayoutAnchorNode
  | LayoutPlaceholderNode;

export type LinkTarget = {
  url: string;
  text: string;
  nodeId: string;
};

export type LayoutResult = {
  root: LayoutNode;
  width: number;
  height: number;
  viewport: { width: number; height: number; dpi: number };
  /** Anchor name to vertical offset, for fragment scrolling. */
  anchors: Map<string, number>;
  links: LinkTarget[];
  warnings: LayoutWarning[];
};
